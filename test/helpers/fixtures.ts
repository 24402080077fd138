import { vi } from "vitest";
import type { RawPost, RawTag } from "../../src/types/gelbooruApi";
import type { Logger } from "../../src/types/logger";

export const createTestLogger = () =>
  ({
    debug: vi.fn(),
    log: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  }) satisfies Logger;

export const rawPost = (overrides: Partial<RawPost> = {}): RawPost => ({
  id: 7,
  created_at: "Sat Jul 16 01:12:54 -0500 2022",
  score: 12,
  width: 1200,
  height: 900,
  md5: "0123456789abcdef0123456789abcdef",
  directory: "01/23",
  image: "0123456789abcdef0123456789abcdef.png",
  rating: "general",
  source: "https://www.pixiv.net/artworks/1",
  change: 1657952000,
  owner: "uploader",
  creator_id: 99,
  parent_id: 0,
  sample: 1,
  preview_height: 187,
  preview_width: 250,
  tags: "1girl  blue_sky solo",
  title: "",
  has_notes: "true",
  has_comments: "false",
  file_url:
    "https://img.example.test/images/01/23/0123456789abcdef0123456789abcdef.png",
  preview_url: "https://img.example.test/thumbnails/01/23/thumb.jpg",
  sample_url: "",
  sample_height: 0,
  sample_width: 0,
  status: "active",
  post_locked: 0,
  has_children: "false",
  ...overrides,
});

export const rawTag = (overrides: Partial<RawTag> = {}): RawTag => ({
  id: 152532,
  name: "blue_sky",
  count: 4021,
  type: 0,
  ambiguous: 0,
  ...overrides,
});

export const emptyListing = { "@attributes": { limit: 1, offset: 0, count: 0 } };

export const commentsXml = (...comments: string[]) =>
  `<?xml version="1.0" encoding="UTF-8"?><comments type="array">${comments.join("")}</comments>`;

export const commentXml = (attrs: {
  id: number;
  postId: number;
  body: string;
  creator: string;
  creatorId: string;
  createdAt: string;
}) =>
  `<comment created_at="${attrs.createdAt}" post_id="${attrs.postId}" body="${attrs.body}" creator="${attrs.creator}" id="${attrs.id}" creator_id="${attrs.creatorId}"/>`;
