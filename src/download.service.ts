import fs from "fs";
import path from "path";
import type { Writable } from "stream";
import { pipeline } from "stream/promises";
import { GelbooruArgumentError } from "./errors";
import { type HttpTransport, NodeHttpTransport } from "./http/transport";
import type { Post } from "./models/post";
import type { Logger } from "./types/logger";
import { extensionOf } from "./utils/file-extensions";
import { PinoLogger } from "./utils/pinoLogger";

export interface DownloadOptions {
  /** Target file. The post's extension is appended when it has none. */
  path?: string;
  /**
   * Sink for the file's bytes. It is left open after a complete transfer and
   * destroyed with the transfer's error when the download fails midway.
   */
  stream?: Writable;
  /** Directory for the default file name. Defaults to the working directory. */
  directory?: string;
  nameBy?: "md5" | "id";
}

export class DownloadService {
  constructor(
    private readonly logger: Logger,
    private readonly transport?: HttpTransport,
  ) {}

  /**
   * Copies the post's file to disk or into `options.stream`.
   * Resolves with the written path, or null when streaming.
   */
  async download(
    post: Post,
    options: DownloadOptions = {},
  ): Promise<string | null> {
    if (options.path && options.stream) {
      throw new GelbooruArgumentError(
        "Only one of path and stream may be provided",
      );
    }

    const transport = this.transport ?? new NodeHttpTransport();
    try {
      const res = await transport.get(post.fileUrl);

      if (options.stream) {
        this.logger.debug(`Streaming post ${post.id} from ${post.fileUrl}`);
        await pipeline(res.stream(), options.stream, { end: false });
        return null;
      }

      const dest = this.resolveTarget(post, options);
      this.logger.log(`Downloading post ${post.id} to ${dest}`);
      await pipeline(res.stream(), fs.createWriteStream(dest));
      return dest;
    } finally {
      if (!this.transport) await transport.close();
    }
  }

  resolveTarget(post: Post, options: DownloadOptions): string {
    const extension = extensionOf(post.fileUrl) || post.extension;

    if (options.path) {
      return path.extname(options.path)
        ? options.path
        : options.path + extension;
    }

    const baseName = options.nameBy === "id" ? String(post.id) : post.md5;
    return path.join(options.directory ?? process.cwd(), baseName + extension);
  }
}

/**
 * Downloads a post over a fresh connection that is closed afterwards.
 */
export function downloadPost(
  post: Post,
  options?: DownloadOptions,
  logger: Logger = new PinoLogger(DownloadService.name),
): Promise<string | null> {
  return new DownloadService(logger).download(post, options);
}
