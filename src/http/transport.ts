import http from "http";
import https from "https";
import type { Readable } from "stream";
import { GelbooruError, GelbooruHttpError } from "../errors";
import { envs } from "../utils/envs";

export interface HttpResponse {
  readonly status: number;
  readonly url: string;
  text(): Promise<string>;
  json(): Promise<unknown>;
  stream(): Readable;
}

/**
 * Minimal GET-only transport. The client and the download helper only talk
 * to the network through this, so tests can swap in an in-memory fake.
 */
export interface HttpTransport {
  get(url: string): Promise<HttpResponse>;
  close(): Promise<void>;
}

class NodeHttpResponse implements HttpResponse {
  constructor(
    private readonly res: http.IncomingMessage,
    readonly url: string,
  ) {}

  get status(): number {
    return this.res.statusCode ?? 0;
  }

  async text(): Promise<string> {
    const chunks: Buffer[] = [];
    for await (const chunk of this.res) {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk) : chunk);
    }
    return Buffer.concat(chunks).toString("utf8");
  }

  async json(): Promise<unknown> {
    return JSON.parse(await this.text());
  }

  stream(): Readable {
    return this.res;
  }
}

export class NodeHttpTransport implements HttpTransport {
  private readonly httpAgent = new http.Agent({ keepAlive: true });
  private readonly httpsAgent = new https.Agent({ keepAlive: true });
  private closed = false;

  constructor(private readonly userAgent = envs.GELBOORU_USER_AGENT) {}

  get(url: string): Promise<HttpResponse> {
    if (this.closed) {
      return Promise.reject(new GelbooruError("Transport is closed"));
    }

    const target = new URL(url);
    const headers = { "User-Agent": this.userAgent };

    return new Promise((resolve, reject) => {
      const onResponse = (res: http.IncomingMessage) => {
        const status = res.statusCode ?? 0;
        if (status < 200 || status >= 300) {
          res.resume();
          reject(new GelbooruHttpError(status, url));
          return;
        }
        resolve(new NodeHttpResponse(res, url));
      };

      const req =
        target.protocol === "http:"
          ? http.get(target, { agent: this.httpAgent, headers }, onResponse)
          : https.get(target, { agent: this.httpsAgent, headers }, onResponse);
      req.on("error", reject);
    });
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
