import crypto from "crypto";
import { createReadStream, promises as fs } from "fs";
import path from "path";
import sharp from "sharp";
import { componentLogger } from "../logger.js";
import { metrics } from "../metrics.js";
import type { MediaReference } from "../../shared/schema.js";
import { MAX_MEDIA_BYTES, MIN_MEDIA_DIMENSION } from "./constants.js";
import { errorMessage, MediaRejectedError, type PreparedMedia } from "./types.js";

const logger = componentLogger("media");

const FORMAT_MIME_TYPES: Record<string, string> = {
  jpeg: "image/jpeg",
  png: "image/png",
  webp: "image/webp",
  gif: "image/gif",
};

export interface MediaOptions {
  maxBytes?: number;
  minDimension?: number;
  /** Directories a path reference may resolve into. */
  allowedRoots?: string[];
}

export function extractBase64(dataUrl: string): { mimeType: string; data: string } {
  const matches = dataUrl.match(/^data:([^;,]+)?(?:;[^,]*)?;base64,(.+)$/);
  if (!matches) {
    throw new Error("Invalid data URL format");
  }
  return { mimeType: matches[1] ?? "application/octet-stream", data: matches[2] };
}

function isWithin(root: string, candidate: string): boolean {
  const relative = path.relative(root, candidate);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

/**
 * Normalizes image inputs before they reach a backend. Rejections are
 * MediaRejectedError, which the pipeline treats as permanent.
 */
export class MediaPreprocessor {
  private readonly maxBytes: number;
  private readonly minDimension: number;
  private readonly allowedRoots: string[];
  private resolvedRoots: Promise<string[]> | null = null;

  constructor(options: MediaOptions = {}) {
    this.maxBytes = options.maxBytes ?? MAX_MEDIA_BYTES;
    this.minDimension = options.minDimension ?? MIN_MEDIA_DIMENSION;
    this.allowedRoots = (options.allowedRoots ?? [process.cwd()]).map((root) => path.resolve(root));
  }

  async prepare(reference: MediaReference): Promise<PreparedMedia> {
    try {
      const prepared = await this.load(reference);
      metrics.recordMedia(true);
      return prepared;
    } catch (error) {
      metrics.recordMedia(false);
      if (error instanceof MediaRejectedError) {
        logger.warn("Media rejected", { source: error.source, reason: error.message });
      }
      throw error;
    }
  }

  async prepareAll(references: readonly MediaReference[]): Promise<PreparedMedia[]> {
    const prepared: PreparedMedia[] = [];
    for (const reference of references) {
      prepared.push(await this.prepare(reference));
    }
    return prepared;
  }

  /**
   * SHA-256 of the file behind each path reference, aligned with the input;
   * other kinds are left undefined. A reference that cannot be read here
   * also stays undefined and is rejected later by prepare().
   */
  async contentDigests(references: readonly MediaReference[]): Promise<Array<string | undefined>> {
    const digests: Array<string | undefined> = [];
    for (const reference of references) {
      digests.push(reference.kind === "path" ? await this.digestPath(reference.path) : undefined);
    }
    return digests;
  }

  private async digestPath(rawPath: string): Promise<string | undefined> {
    try {
      const canonical = await this.locate(rawPath);
      const hash = crypto.createHash("sha256");
      for await (const chunk of createReadStream(canonical)) {
        hash.update(chunk);
      }
      return hash.digest("hex");
    } catch (error) {
      logger.debug("Media digest unavailable", { source: rawPath, error: errorMessage(error) });
      return undefined;
    }
  }

  private async load(reference: MediaReference): Promise<PreparedMedia> {
    switch (reference.kind) {
      case "path":
        return this.loadPath(reference.path);
      case "bytes":
        return this.inspect(Buffer.from(reference.data), reference.label ?? "<bytes>");
      case "dataUrl": {
        let data: string;
        try {
          data = extractBase64(reference.url).data;
        } catch {
          throw new MediaRejectedError("Invalid data URL format", "<data-url>");
        }
        const estimated = Math.floor((data.length * 3) / 4);
        if (estimated > this.maxBytes) {
          throw new MediaRejectedError(`Media exceeds ${this.maxBytes} bytes`, "<data-url>");
        }
        return this.inspect(Buffer.from(data, "base64"), "<data-url>");
      }
    }
  }

  private roots(): Promise<string[]> {
    if (!this.resolvedRoots) {
      this.resolvedRoots = Promise.all(
        this.allowedRoots.map((root) => fs.realpath(root).catch(() => root))
      );
    }
    return this.resolvedRoots;
  }

  /** Resolves a path reference to a permitted regular file within the size ceiling. */
  private async locate(rawPath: string): Promise<string> {
    let canonical: string;
    try {
      // realpath follows symlinks, so a link cannot point outside the roots.
      canonical = await fs.realpath(path.resolve(rawPath));
    } catch {
      throw new MediaRejectedError(`Media file not found: ${rawPath}`, rawPath);
    }

    const roots = await this.roots();
    if (!roots.some((root) => isWithin(root, canonical))) {
      throw new MediaRejectedError(`Media path is outside the permitted directories: ${rawPath}`, rawPath);
    }

    const stat = await fs.stat(canonical);
    if (!stat.isFile()) {
      throw new MediaRejectedError(`Media path is not a file: ${rawPath}`, rawPath);
    }
    if (stat.size > this.maxBytes) {
      throw new MediaRejectedError(`Media exceeds ${this.maxBytes} bytes (${stat.size})`, rawPath);
    }
    return canonical;
  }

  private async loadPath(rawPath: string): Promise<PreparedMedia> {
    const canonical = await this.locate(rawPath);
    return this.inspect(await fs.readFile(canonical), canonical);
  }

  private async inspect(buffer: Buffer, source: string): Promise<PreparedMedia> {
    if (buffer.length > this.maxBytes) {
      throw new MediaRejectedError(`Media exceeds ${this.maxBytes} bytes (${buffer.length})`, source);
    }

    // The content decides the type; file extensions are ignored.
    let format: string | undefined;
    let width: number | undefined;
    let height: number | undefined;
    try {
      const metadata = await sharp(buffer).metadata();
      format = metadata.format;
      width = metadata.width;
      height = metadata.height;
    } catch {
      throw new MediaRejectedError("Unrecognized media content", source);
    }

    const mimeType = format ? FORMAT_MIME_TYPES[format] : undefined;
    if (!mimeType) {
      throw new MediaRejectedError(`Unsupported media format: ${format ?? "unknown"}`, source);
    }
    if (width !== undefined && height !== undefined && (width < this.minDimension || height < this.minDimension)) {
      throw new MediaRejectedError(`Image dimensions too small: ${width}x${height}`, source);
    }

    return { mimeType, data: buffer.toString("base64"), bytes: buffer.length, source, width, height };
  }
}
