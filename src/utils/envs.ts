import "dotenv/config";

export const envs = {
  GELBOORU_API_KEY: process.env.GELBOORU_API_KEY || undefined,
  GELBOORU_USER_ID: process.env.GELBOORU_USER_ID || undefined,
  GELBOORU_BASE_URL: String(
    process.env.GELBOORU_BASE_URL || "https://gelbooru.com/index.php",
  ),
  GELBOORU_USER_AGENT: String(
    process.env.GELBOORU_USER_AGENT || "gelbooru-api-client/1.0",
  ),
  LOG_LEVEL: String(process.env.LOG_LEVEL || "info"),
  LOG_PRETTY: process.env.LOG_PRETTY === "true",
};
