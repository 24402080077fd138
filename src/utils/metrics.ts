import client from "prom-client";

const byRegistry = new WeakMap<client.Registry, GelbooruMetrics>();

export class GelbooruMetrics {
  private readonly requests: client.Counter<"endpoint" | "status">;
  private readonly duration: client.Histogram<"endpoint">;

  /**
   * Metrics are registered once per registry and shared by every client
   * that records into it.
   */
  static forRegistry(registry: client.Registry): GelbooruMetrics {
    let metrics = byRegistry.get(registry);
    if (!metrics) {
      metrics = new GelbooruMetrics(registry);
      byRegistry.set(registry, metrics);
    }
    return metrics;
  }

  private constructor(registry: client.Registry) {
    this.requests = new client.Counter({
      name: "gelbooru_requests_total",
      help: "Requests sent to the Gelbooru API by endpoint and outcome",
      labelNames: ["endpoint", "status"],
      registers: [registry],
    });

    this.duration = new client.Histogram({
      name: "gelbooru_request_duration_seconds",
      help: "Gelbooru API round trip time",
      labelNames: ["endpoint"],
      registers: [registry],
    });
  }

  startRequest(endpoint: string): (status: string) => void {
    const stopTimer = this.duration.startTimer({ endpoint });
    return (status) => {
      stopTimer();
      this.requests.inc({ endpoint, status });
    };
  }
}
