import { z } from "zod";

/**
 * Raw Gelbooru DAPI payloads.
 * Documentation: https://gelbooru.com/index.php?page=wiki&s=view&id=18780
 */

const flag = z.union([z.string(), z.boolean(), z.number()]).optional();

export const rawPostSchema = z
  .object({
    id: z.coerce.number().int(),
    created_at: z.string(),
    score: z.coerce.number().optional(),
    width: z.coerce.number(),
    height: z.coerce.number(),
    md5: z.string(),
    directory: z.string().optional(),
    image: z.string().optional(),
    rating: z.string(),
    source: z.string().optional(),
    change: z.coerce.number().optional(),
    owner: z.string().optional(),
    creator_id: z.coerce.number().optional(),
    parent_id: z.union([z.coerce.number(), z.null()]).optional(),
    sample: flag,
    preview_height: z.coerce.number().optional(),
    preview_width: z.coerce.number().optional(),
    tags: z.string(),
    title: z.string().optional(),
    has_notes: flag,
    has_comments: flag,
    file_url: z.string(),
    preview_url: z.string().optional(),
    sample_url: z.string().optional(),
    sample_height: z.coerce.number().optional(),
    sample_width: z.coerce.number().optional(),
    status: z.string().optional(),
    post_locked: flag,
    has_children: flag,
  })
  .passthrough();

export type RawPost = z.infer<typeof rawPostSchema>;

export const rawTagSchema = z
  .object({
    id: z.coerce.number().int(),
    name: z.string(),
    count: z.coerce.number().int(),
    type: z.union([z.number(), z.string()]),
    ambiguous: flag,
  })
  .passthrough();

export type RawTag = z.infer<typeof rawTagSchema>;

// Comment attributes as produced by fast-xml-parser with an empty prefix.
export const rawCommentSchema = z
  .object({
    id: z.coerce.number().int(),
    post_id: z.coerce.number().int(),
    body: z.string().default(""),
    creator: z.string().default(""),
    creator_id: z.string().optional(),
    created_at: z.string(),
  })
  .passthrough();

export type RawComment = z.infer<typeof rawCommentSchema>;

const listOf = <T extends z.ZodTypeAny>(item: T) =>
  z.preprocess((value) => {
    if (value === undefined || value === null) return [];
    return Array.isArray(value) ? value : [value];
  }, z.array(item));

export const postsResponseSchema = z
  .object({ post: listOf(rawPostSchema) })
  .passthrough();

export const tagsResponseSchema = z
  .object({ tag: listOf(rawTagSchema) })
  .passthrough();

export const commentsResponseSchema = z.object({
  comments: z.union([
    z.object({ comment: listOf(rawCommentSchema) }).passthrough(),
    z.string(),
  ]),
});
