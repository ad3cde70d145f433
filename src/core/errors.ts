import type { JsonObject } from "./json.js";

export class PipelineError extends Error {
  readonly code: string;
  readonly details: JsonObject;

  constructor(message: string, code = "UNKNOWN_ERROR", details: JsonObject = {}) {
    super(message);
    this.name = "PipelineError";
    this.code = code;
    this.details = details;
  }

  toJSON(): { code: string; message: string; details: JsonObject } {
    return { code: this.code, message: this.message, details: this.details };
  }
}

export class ConfigurationError extends PipelineError {
  constructor(message: string, details: JsonObject = {}) {
    super(message, "CONFIGURATION_ERROR", details);
    this.name = "ConfigurationError";
  }
}

export class ContentGenerationError extends PipelineError {
  constructor(message: string, details: JsonObject = {}) {
    super(message, "CONTENT_GENERATION_ERROR", details);
    this.name = "ContentGenerationError";
  }
}

export class MediaGenerationError extends PipelineError {
  constructor(message: string, details: JsonObject = {}) {
    super(message, "MEDIA_GENERATION_ERROR", details);
    this.name = "MediaGenerationError";
  }
}

export class PublishError extends PipelineError {
  constructor(message: string, details: JsonObject = {}) {
    super(message, "PUBLISH_ERROR", details);
    this.name = "PublishError";
  }
}

export class ResourceNotFoundError extends PipelineError {
  constructor(resourceType: string, resourceId: string, details: JsonObject = {}) {
    super(`${resourceType} with id '${resourceId}' not found`, "RESOURCE_NOT_FOUND", details);
    this.name = "ResourceNotFoundError";
  }
}

export class MessageValidationError extends PipelineError {
  constructor(message: string, details: JsonObject = {}) {
    super(message, "MESSAGE_VALIDATION_ERROR", details);
    this.name = "MessageValidationError";
  }
}

export class AgentRunError extends PipelineError {
  constructor(message: string, details: JsonObject = {}) {
    super(message, "AGENT_RUN_ERROR", details);
    this.name = "AgentRunError";
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function errorCode(err: unknown): string {
  return err instanceof PipelineError ? err.code : "UNKNOWN_ERROR";
}
