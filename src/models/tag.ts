import type { RawTag } from "../types/gelbooruApi";

export type TagType =
  | "general"
  | "artist"
  | "copyright"
  | "character"
  | "metadata"
  | "deprecated"
  | "unknown";

const CATEGORY_MAP: Record<number, TagType> = {
  0: "general",
  1: "artist",
  3: "copyright",
  4: "character",
  5: "metadata",
  6: "deprecated",
};

const LEGACY_NAMES: Record<string, TagType> = {
  tag: "general",
  general: "general",
  artist: "artist",
  copyright: "copyright",
  character: "character",
  metadata: "metadata",
  meta: "metadata",
  deprecated: "deprecated",
};

export const parseTagType = (type: number | string): TagType => {
  if (typeof type === "number") return CATEGORY_MAP[type] ?? "unknown";
  if (/^\d+$/.test(type)) return CATEGORY_MAP[Number(type)] ?? "unknown";
  return LEGACY_NAMES[type.toLowerCase()] ?? "unknown";
};

export class Tag {
  readonly id: number;
  readonly name: string;
  readonly count: number;
  readonly type: TagType;
  readonly ambiguous: boolean;

  constructor(readonly data: Readonly<RawTag>) {
    this.id = data.id;
    this.name = data.name;
    this.count = data.count;
    this.type = parseTagType(data.type);
    this.ambiguous =
      data.ambiguous === true ||
      data.ambiguous === "true" ||
      Number(data.ambiguous) === 1;
    Object.freeze(this);
  }

  get isMeta(): boolean {
    return this.type === "metadata";
  }

  toString(): string {
    return this.name;
  }
}
