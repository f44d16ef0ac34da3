import * as http from "http";

export interface FixtureResponse {
  status?: number;
  body?: string;
  contentType?: string;
  /** Milliseconds to wait before responding */
  delayMs?: number;
}

export type FixtureHandler = (
  req: http.IncomingMessage,
  res: http.ServerResponse
) => void;

export type FixtureRoute = FixtureResponse | FixtureHandler;

export interface FixtureServer {
  baseUrl: string;
  url(pathAndQuery: string): string;
  /** Requests received, by path including query string */
  hits(pathAndQuery: string): number;
  close(): Promise<void>;
}

/**
 * Serve canned responses from 127.0.0.1 on an ephemeral port.
 * Routes are keyed by path plus query string; anything else is a 404.
 * `routes` is read on every request, so tests may add routes after start.
 */
export async function startFixtureServer(
  routes: Record<string, FixtureRoute>
): Promise<FixtureServer> {
  const counts = new Map<string, number>();

  const server = http.createServer((req, res) => {
    const key = req.url ?? "/";
    counts.set(key, (counts.get(key) ?? 0) + 1);

    const route = routes[key];
    if (route === undefined) {
      res.statusCode = 404;
      res.end("not found");
      return;
    }
    if (typeof route === "function") {
      route(req, res);
      return;
    }

    const respond = () => {
      res.statusCode = route.status ?? 200;
      if (route.contentType) res.setHeader("Content-Type", route.contentType);
      res.end(route.body ?? "");
    };
    if (route.delayMs) setTimeout(respond, route.delayMs);
    else respond();
  });

  await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
  const address = server.address();
  if (address === null || typeof address === "string") {
    throw new Error("Fixture server is not listening on a TCP port");
  }
  const baseUrl = `http://127.0.0.1:${address.port}`;

  return {
    baseUrl,
    url: (pathAndQuery) => `${baseUrl}${pathAndQuery}`,
    hits: (pathAndQuery) => counts.get(pathAndQuery) ?? 0,
    close: () =>
      new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeAllConnections();
      }),
  };
}

/**
 * A handler that answers 200 at once, then sends its body one byte every
 * `intervalMs` until `totalMs` have passed.
 */
export function drippingBody(intervalMs: number, totalMs: number): FixtureHandler {
  return (_req, res) => {
    res.writeHead(200, { "Content-Type": "text/plain" });
    res.flushHeaders();
    const started = Date.now();
    const timer = setInterval(() => {
      if (Date.now() - started >= totalMs) {
        clearInterval(timer);
        res.end();
        return;
      }
      res.write(".");
    }, intervalMs);
    res.on("close", () => clearInterval(timer));
  };
}

/**
 * Start a server whose routes need to know its own URL, such as a
 * sitemap index pointing at child sitemaps on the same server.
 */
export async function startLinkedFixtureServer(
  build: (url: (pathAndQuery: string) => string) => Record<string, FixtureRoute>
): Promise<FixtureServer> {
  const routes: Record<string, FixtureRoute> = {};
  const server = await startFixtureServer(routes);
  Object.assign(routes, build(server.url));
  return server;
}

/**
 * A URL on 127.0.0.1 where nothing listens any more, for connection
 * failures.
 */
export async function refusedUrl(pathAndQuery = "/"): Promise<string> {
  const server = await startFixtureServer({});
  const url = server.url(pathAndQuery);
  await server.close();
  return url;
}

export function urlset(locs: string[]): string {
  const entries = locs
    .map((loc) => `  <url>\n    <loc>${loc}</loc>\n  </url>`)
    .join("\n");
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">',
    entries,
    "</urlset>",
  ].join("\n");
}

export function sitemapIndex(locs: string[]): string {
  const entries = locs
    .map((loc) => `  <sitemap>\n    <loc>${loc}</loc>\n  </sitemap>`)
    .join("\n");
  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">',
    entries,
    "</sitemapindex>",
  ].join("\n");
}
