export {
  GelbooruService,
  POSTS_HARD_LIMIT,
  type GelbooruServiceOptions,
  type SearchPostsOptions,
  type GetPostOptions,
  type SearchTagsOptions,
  type GetTagOptions,
  type TagOrder,
  type TagOrderBy,
} from "./gelbooru.service";
export {
  DownloadService,
  downloadPost,
  type DownloadOptions,
} from "./download.service";
export {
  GelbooruError,
  GelbooruArgumentError,
  GelbooruLimitError,
  GelbooruHttpError,
  GelbooruResponseError,
} from "./errors";
export {
  NodeHttpTransport,
  type HttpTransport,
  type HttpResponse,
} from "./http/transport";
export { Post, type ImageDimensions } from "./models/post";
export { Tag, parseTagType, type TagType } from "./models/tag";
export { Comment } from "./models/comment";
export type { RawPost, RawTag, RawComment } from "./types/gelbooruApi";
export type { Logger } from "./types/logger";
export { PinoLogger } from "./utils/pinoLogger";
export { GelbooruMetrics } from "./utils/metrics";
export { formatTags, normalizeTag, buildQuery } from "./utils/query";
export type { FileCategory } from "./utils/file-extensions";
