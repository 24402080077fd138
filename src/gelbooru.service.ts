import { XMLParser } from "fast-xml-parser";
import type { Registry } from "prom-client";
import { z } from "zod";
import { type DownloadOptions, DownloadService } from "./download.service";
import {
  GelbooruArgumentError,
  GelbooruError,
  GelbooruHttpError,
  GelbooruLimitError,
  GelbooruResponseError,
} from "./errors";
import {
  type HttpResponse,
  type HttpTransport,
  NodeHttpTransport,
} from "./http/transport";
import { Comment } from "./models/comment";
import { Post } from "./models/post";
import { Tag } from "./models/tag";
import {
  commentsResponseSchema,
  postsResponseSchema,
  tagsResponseSchema,
} from "./types/gelbooruApi";
import type { Logger } from "./types/logger";
import { envs } from "./utils/envs";
import { GelbooruMetrics } from "./utils/metrics";
import { PinoLogger } from "./utils/pinoLogger";
import {
  type QueryValue,
  buildQuery,
  formatTags,
  normalizeTag,
  redactUrl,
} from "./utils/query";

export const POSTS_HARD_LIMIT = 1000;

type Endpoint = "post" | "tag" | "comment";

export type TagOrder = "asc" | "desc";
export type TagOrderBy = "date" | "count" | "name";

const TAG_ORDERS: ReadonlySet<string> = new Set<TagOrder>(["asc", "desc"]);
const TAG_ORDER_BYS: ReadonlySet<string> = new Set<TagOrderBy>([
  "date",
  "count",
  "name",
]);

export interface GelbooruServiceOptions {
  /** Must be given together with `userId`. */
  apiKey?: string;
  userId?: string;
  baseUrl?: string;
  userAgent?: string;
  logger?: Logger;
  transport?: HttpTransport;
  /** Registry that receives request metrics. Nothing is recorded without one. */
  registry?: Registry;
}

export interface SearchPostsOptions {
  excludeTags?: readonly string[];
  limit?: number;
  page?: number;
  random?: boolean;
}

export interface GetPostOptions {
  postId?: number;
  md5?: string;
}

export interface SearchTagsOptions {
  names?: readonly string[];
  limit?: number;
  /** "_" matches one character and "%" any run of characters. */
  namePattern?: string;
  afterId?: number;
  order?: TagOrder | Uppercase<TagOrder>;
  orderBy?: TagOrderBy;
}

export interface GetTagOptions {
  name?: string;
  tagId?: number;
}

const commentParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "",
  htmlEntities: true,
  isArray: (name) => name === "comment",
});

export class GelbooruService {
  private readonly baseUrl: string;
  private readonly credentials: { api_key: string; user_id: string } | null;
  private readonly transport: HttpTransport;
  private readonly logger: Logger;
  private readonly metrics: GelbooruMetrics | null;
  private readonly downloads: DownloadService;
  private closed = false;

  constructor(options: GelbooruServiceOptions = {}) {
    const { apiKey, userId } = options;
    if (Boolean(apiKey) !== Boolean(userId)) {
      throw new GelbooruArgumentError(
        "Both api key and user id must be specified if either is",
      );
    }

    this.baseUrl = options.baseUrl ?? envs.GELBOORU_BASE_URL;
    this.credentials =
      apiKey && userId ? { api_key: apiKey, user_id: userId } : null;
    this.transport =
      options.transport ?? new NodeHttpTransport(options.userAgent);
    this.logger = options.logger ?? new PinoLogger(GelbooruService.name);
    this.metrics = options.registry
      ? GelbooruMetrics.forRegistry(options.registry)
      : null;
    this.downloads = new DownloadService(this.logger, this.transport);

    if (!this.credentials) {
      this.logger.debug(
        "No credentials given, requests may be rate limited more strictly",
      );
    }
  }

  /**
   * Client configured from GELBOORU_* environment variables.
   */
  static fromEnv(
    options: Omit<GelbooruServiceOptions, "apiKey" | "userId"> = {},
  ): GelbooruService {
    return new GelbooruService({
      ...options,
      apiKey: envs.GELBOORU_API_KEY,
      userId: envs.GELBOORU_USER_ID,
    });
  }

  async searchPosts(
    tags: readonly string[],
    options: SearchPostsOptions = {},
  ): Promise<Post[]> {
    const { excludeTags, limit = 1, page = 0, random = false } = options;

    if (limit > POSTS_HARD_LIMIT) {
      throw new GelbooruLimitError(
        `Gelbooru can only return ${POSTS_HARD_LIMIT} posts in a single request`,
      );
    }
    assertPositiveInteger("limit", limit);
    if (!Number.isInteger(page) || page < 0) {
      throw new GelbooruArgumentError(
        `page must be a non-negative integer, got ${page}`,
      );
    }

    const include = random ? [...tags, "sort:random"] : tags;
    const res = await this.request("post", {
      tags: formatTags(include, excludeTags),
      limit,
      pid: page > 0 ? page : undefined,
    });
    const body = parseBody(postsResponseSchema, await res.json(), res.url);

    return body.post.map((raw) => new Post(raw));
  }

  /**
   * Looks a post up by id or by md5. Resolves with at most one post.
   */
  async getPost(options: GetPostOptions): Promise<Post[]> {
    const { postId, md5 } = options;
    const hash = md5?.trim().toLowerCase() ?? "";
    const hasId = postId !== undefined;
    const hasMd5 = hash !== "";

    if (hasId === hasMd5) {
      throw new GelbooruArgumentError(
        "Must specify a post id or an md5, and not both",
      );
    }

    const res = await this.request(
      "post",
      hasMd5 ? { tags: `md5:${hash}` } : { id: postId },
    );
    const body = parseBody(postsResponseSchema, await res.json(), res.url);
    const posts = body.post.slice(0, 1).map((raw) => new Post(raw));

    if (hasMd5) {
      return posts.filter((post) => post.md5.toLowerCase() === hash);
    }
    return posts;
  }

  async getPostComments(post: Post | number): Promise<Comment[]> {
    const postId = typeof post === "number" ? post : post.id;

    const res = await this.request("comment", { post_id: postId });
    const xml = await res.text();
    const body = parseBody(
      commentsResponseSchema,
      commentParser.parse(xml),
      res.url,
    );

    if (typeof body.comments === "string") return [];
    return body.comments.comment.map((raw) => new Comment(raw));
  }

  async searchTags(options: SearchTagsOptions = {}): Promise<Tag[]> {
    const { limit = 1, namePattern, afterId, order, orderBy } = options;
    const names = options.names ? [...options.names] : [];

    if (names.length > 0 && namePattern) {
      throw new GelbooruArgumentError(
        "Only one of names and namePattern may be provided",
      );
    }
    if (namePattern && afterId !== undefined) {
      throw new GelbooruArgumentError(
        "namePattern and afterId cannot be combined, the API ignores one of them",
      );
    }
    if (orderBy !== undefined && !TAG_ORDER_BYS.has(orderBy)) {
      throw new GelbooruArgumentError(
        `orderBy must be 'date', 'count' or 'name', got '${orderBy}'`,
      );
    }
    const normalizedOrder = order?.toLowerCase();
    if (normalizedOrder !== undefined && !TAG_ORDERS.has(normalizedOrder)) {
      throw new GelbooruArgumentError(
        `order must be 'asc' or 'desc', got '${order}'`,
      );
    }
    assertPositiveInteger("limit", limit);

    const res = await this.request("tag", {
      names: names.length > 0 ? formatTags(names) : undefined,
      name_pattern: namePattern || undefined,
      after_id: afterId,
      orderby: orderBy,
      order: normalizedOrder,
      limit,
    });
    const body = parseBody(tagsResponseSchema, await res.json(), res.url);

    return body.tag.map((raw) => new Tag(raw));
  }

  /**
   * Looks a tag up by name or id. Resolves with null when it does not exist.
   */
  async getTag(options: GetTagOptions): Promise<Tag | null> {
    const { name, tagId } = options;
    const tagName = name ? normalizeTag(name) : "";
    const hasName = tagName !== "";
    const hasId = tagId !== undefined;

    if (hasName === hasId) {
      throw new GelbooruArgumentError(
        "Must specify a name or tag id, and not both",
      );
    }

    const res = await this.request(
      "tag",
      hasName ? { name: tagName } : { id: tagId },
    );
    const body = parseBody(tagsResponseSchema, await res.json(), res.url);
    const [first] = body.tag;

    return first ? new Tag(first) : null;
  }

  /**
   * Downloads a post's file through this client's connection pool.
   */
  async downloadPost(
    post: Post,
    options?: DownloadOptions,
  ): Promise<string | null> {
    this.assertOpen();
    return this.downloads.download(post, options);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.transport.close();
  }

  private assertOpen() {
    if (this.closed) throw new GelbooruError("Client is closed");
  }

  private async request(
    endpoint: Endpoint,
    params: Record<string, QueryValue>,
  ): Promise<HttpResponse> {
    this.assertOpen();

    const query = buildQuery({
      page: "dapi",
      s: endpoint,
      q: "index",
      ...params,
      // The comment endpoint only speaks XML.
      json: endpoint === "comment" ? undefined : 1,
    });
    const auth = this.credentials ? `&${buildQuery(this.credentials)}` : "";
    const url = `${this.baseUrl}?${query}${auth}`;

    this.logger.debug(`GET ${this.baseUrl}?${query}`);
    const done = this.metrics?.startRequest(endpoint);

    try {
      const res = await this.transport.get(url);
      done?.(String(res.status));
      return res;
    } catch (err) {
      done?.(err instanceof GelbooruHttpError ? String(err.status) : "error");
      this.logger.warn(`Request to the ${endpoint} endpoint failed`, err);
      throw err;
    }
  }
}

function assertPositiveInteger(name: string, value: number) {
  if (!Number.isInteger(value) || value < 1) {
    throw new GelbooruArgumentError(
      `${name} must be a positive integer, got ${value}`,
    );
  }
}

function parseBody<S extends z.ZodTypeAny>(
  schema: S,
  payload: unknown,
  url: string,
): z.infer<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new GelbooruResponseError(
      `Unexpected response from ${redactUrl(url)}: ${result.error.message}`,
      { cause: result.error },
    );
  }
  return result.data;
}
