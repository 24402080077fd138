import { parse as parseTldts } from "tldts";
import type { RawPost } from "../types/gelbooruApi";
import { parsePostDate } from "../utils/parseDate";
import {
  type FileCategory,
  categoryOf,
  extensionOf,
} from "../utils/file-extensions";

export interface ImageDimensions {
  width: number;
  height: number;
}

const isTrue = (value: string | boolean | number | undefined): boolean =>
  value === true || value === 1 || value === "true" || value === "1";

/**
 * A Gelbooru post. The validated API payload stays available on `data`
 * for fields not mapped here.
 */
export class Post {
  readonly id: number;
  readonly createdAt: Date;
  readonly score: number;
  readonly width: number;
  readonly height: number;
  readonly md5: string;
  readonly directory: string;
  readonly fileName: string;
  readonly rating: string;
  readonly source: string;
  readonly change: number;
  readonly owner: string;
  readonly creatorId: number;
  readonly parentId: number | null;
  readonly hasSample: boolean;
  readonly previewUrl: string;
  readonly previewWidth: number;
  readonly previewHeight: number;
  readonly sampleUrl: string;
  readonly sampleWidth: number;
  readonly sampleHeight: number;
  readonly tags: readonly string[];
  readonly title: string;
  readonly hasNotes: boolean;
  readonly hasComments: boolean;
  readonly hasChildren: boolean;
  readonly fileUrl: string;
  readonly status: string;
  readonly postLocked: boolean;

  constructor(readonly data: Readonly<RawPost>) {
    this.id = data.id;
    this.createdAt = parsePostDate(data.created_at);
    this.score = data.score ?? 0;
    this.width = data.width;
    this.height = data.height;
    this.md5 = data.md5;
    this.directory = data.directory ?? "";
    this.fileName = data.image ?? "";
    this.rating = data.rating;
    this.source = data.source ?? "";
    this.change = data.change ?? 0;
    this.owner = data.owner ?? "";
    this.creatorId = data.creator_id ?? 0;
    this.parentId = data.parent_id ? data.parent_id : null;
    this.hasSample = isTrue(data.sample);
    this.previewUrl = data.preview_url ?? "";
    this.previewWidth = data.preview_width ?? 0;
    this.previewHeight = data.preview_height ?? 0;
    this.sampleUrl = data.sample_url ?? "";
    this.sampleWidth = data.sample_width ?? 0;
    this.sampleHeight = data.sample_height ?? 0;
    this.tags = Object.freeze(data.tags.split(/\s+/).filter((t) => t.length));
    this.title = data.title ?? "";
    this.hasNotes = isTrue(data.has_notes);
    this.hasComments = isTrue(data.has_comments);
    this.hasChildren = isTrue(data.has_children);
    this.fileUrl = data.file_url;
    this.status = data.status ?? "";
    this.postLocked = isTrue(data.post_locked);
    Object.freeze(this);
  }

  get dimensions(): ImageDimensions {
    return { width: this.width, height: this.height };
  }

  get extension(): string {
    return extensionOf(this.fileName) || extensionOf(this.fileUrl);
  }

  get fileCategory(): FileCategory {
    return categoryOf(this.extension);
  }

  /** Registrable domain of `source`, e.g. "pixiv.net". */
  get sourceDomain(): string | null {
    if (!this.source) return null;
    try {
      return parseTldts(new URL(this.source).hostname).domain;
    } catch {
      return null;
    }
  }

  toString(): string {
    return this.fileUrl;
  }
}
