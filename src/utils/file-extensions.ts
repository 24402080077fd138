import path from "path";

export const FILE_EXTENSIONS = {
  image: ["jpg", "jpeg", "png", "gif", "bmp", "webp", "avif", "jfif"] as const,
  video: ["webm", "mp4", "mov", "m4v"] as const,
  flash: ["swf"] as const,
};

export type FileCategory = keyof typeof FILE_EXTENSIONS | "unknown";

/**
 * Extension of a file name or URL, lowercased and with its leading dot
 * (".jpg"), or "" when there is none. Query strings and fragments are ignored.
 */
export const extensionOf = (fileNameOrUrl: string): string => {
  let pathname = fileNameOrUrl;
  try {
    pathname = new URL(fileNameOrUrl).pathname;
  } catch {
    pathname = fileNameOrUrl.split(/[?#]/)[0];
  }
  return path.posix.extname(pathname).toLowerCase();
};

export const categoryOf = (extension: string): FileCategory => {
  const ext = extension.trim().replace(/^\./, "").toLowerCase();
  if (!ext) return "unknown";

  for (const category of Object.keys(FILE_EXTENSIONS) as Array<
    keyof typeof FILE_EXTENSIONS
  >) {
    if ((FILE_EXTENSIONS[category] as readonly string[]).includes(ext)) {
      return category;
    }
  }

  return "unknown";
};
