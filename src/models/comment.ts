import type { RawComment } from "../types/gelbooruApi";
import { parseCommentDate } from "../utils/parseDate";

export class Comment {
  readonly id: number;
  readonly postId: number;
  readonly author: string;
  /** 0 for anonymous comments. */
  readonly authorId: number;
  readonly content: string;
  readonly createdAt: Date;

  constructor(readonly data: Readonly<RawComment>) {
    this.id = data.id;
    this.postId = data.post_id;
    this.author = data.creator;
    this.authorId = data.creator_id ? Number.parseInt(data.creator_id, 10) : 0;
    this.content = data.body;
    this.createdAt = parseCommentDate(data.created_at);
    Object.freeze(this);
  }

  toString(): string {
    return `${this.author}: ${this.content}`;
  }
}
