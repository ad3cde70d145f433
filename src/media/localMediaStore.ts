import { createHash, randomBytes } from "crypto";
import { promises as fs } from "fs";
import path from "path";
import { pathToFileURL } from "url";

export interface StoredMedia {
  mediaRef: string;
  url: string;
  contentType: string;
  sizeBytes: number;
  checksumSha256: `sha256:${string}`;
}

/** Document id of a stored blob: `media/media-ab12.svg` → `media-ab12`. */
export function mediaIdOf(mediaRef: string): string {
  return mediaRef.replace(/^media\//, "").replace(/\.[A-Za-z0-9]+$/, "");
}

export interface MediaStore {
  putBytes(input: { name?: string; bytes: Buffer; contentType: string; extension: string }): Promise<StoredMedia>;
}

/** Writes media blobs beneath one directory and hands back file:// URLs. */
export class LocalMediaStore implements MediaStore {
  constructor(private readonly rootDir: string) {}

  async init(): Promise<void> {
    await fs.mkdir(this.rootDir, { recursive: true });
  }

  private objectPath(name: string): string {
    return path.join(this.rootDir, name);
  }

  async putBytes(input: { name?: string; bytes: Buffer; contentType: string; extension: string }): Promise<StoredMedia> {
    await this.init();
    const name = input.name ?? `media-${randomBytes(8).toString("hex")}.${input.extension}`;
    const objectPath = this.objectPath(name);
    await fs.writeFile(objectPath, input.bytes);
    return {
      mediaRef: `media/${name}`,
      url: pathToFileURL(path.resolve(objectPath)).href,
      contentType: input.contentType,
      sizeBytes: input.bytes.byteLength,
      checksumSha256: `sha256:${createHash("sha256").update(input.bytes).digest("hex")}`
    };
  }

  async read(mediaRef: string): Promise<Buffer> {
    return fs.readFile(this.objectPath(mediaRef.replace(/^media\//, "")));
  }
}
