import { ulid } from "ulid";
import { randomBytes } from "crypto";

export type RunTraceId = string;

function prefixed(prefix: string): `${string}_${string}` {
  return `${prefix}_${ulid()}` as const;
}

export function newRunTraceId(): RunTraceId {
  return prefixed("run");
}

export function newPostId(): string {
  return `post-${randomBytes(6).toString("hex")}`;
}

export function newContentId(): string {
  return `content-${randomBytes(16).toString("hex")}`;
}
