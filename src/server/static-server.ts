import * as http from 'http';
import * as fs from 'fs';
import * as path from 'path';

const MIME_TYPES: Record<string, string> = {
  '.html': 'text/html; charset=utf-8',
  '.htm': 'text/html; charset=utf-8',
  '.js': 'application/javascript; charset=utf-8',
  '.mjs': 'application/javascript; charset=utf-8',
  '.css': 'text/css; charset=utf-8',
  '.json': 'application/json; charset=utf-8',
  '.map': 'application/json',
  '.txt': 'text/plain; charset=utf-8',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.svg': 'image/svg+xml',
  '.ico': 'image/x-icon',
  '.wasm': 'application/wasm',
  '.zip': 'application/zip',
  '.woff': 'font/woff',
  '.woff2': 'font/woff2',
  '.ttf': 'font/ttf',
};

export function contentTypeFor(filePath: string): string {
  return MIME_TYPES[path.extname(filePath).toLowerCase()] || 'application/octet-stream';
}

function sendText(res: http.ServerResponse, method: string, status: number, body: string): void {
  res.writeHead(status, {
    'Content-Type': 'text/plain; charset=utf-8',
    'Content-Length': Buffer.byteLength(body),
  });
  res.end(method === 'HEAD' ? undefined : body);
}

function serveFile(filePath: string, size: number, method: string, res: http.ServerResponse): void {
  res.writeHead(200, {
    'Content-Type': contentTypeFor(filePath),
    'Content-Length': size,
    'Cache-Control': 'no-cache',
  });
  if (method === 'HEAD') {
    res.end();
    return;
  }
  const stream = fs.createReadStream(filePath);
  stream.on('error', () => res.destroy());
  stream.pipe(res);
}

function statOrUndefined(filePath: string): fs.Stats | undefined {
  try {
    return fs.statSync(filePath);
  } catch {
    return undefined;
  }
}

/**
 * Request handler serving files under `root`. `/` maps to index.html, a
 * directory to its index.html. Only GET and HEAD are answered.
 */
export function createRequestHandler(root: string): http.RequestListener {
  const resolvedRoot = path.resolve(root);

  return (req, res) => {
    const method = req.method ?? 'GET';
    if (method !== 'GET' && method !== 'HEAD') {
      res.writeHead(405, { Allow: 'GET, HEAD' });
      res.end();
      return;
    }

    let urlPath: string;
    try {
      urlPath = decodeURIComponent(new URL(req.url ?? '/', 'http://localhost').pathname);
    } catch {
      sendText(res, method, 400, 'Bad Request');
      return;
    }

    const relPath = urlPath === '/' || urlPath === '' ? 'index.html' : urlPath.replace(/^\/+/, '');
    const target = path.resolve(resolvedRoot, relPath);

    // Never serve anything outside the root
    if (target !== resolvedRoot && !target.startsWith(resolvedRoot + path.sep)) {
      sendText(res, method, 403, 'Forbidden');
      return;
    }

    const stat = statOrUndefined(target);
    if (stat?.isFile()) {
      serveFile(target, stat.size, method, res);
      return;
    }

    if (stat?.isDirectory()) {
      const indexFile = path.join(target, 'index.html');
      const indexStat = statOrUndefined(indexFile);
      if (indexStat?.isFile()) {
        serveFile(indexFile, indexStat.size, method, res);
        return;
      }
    }

    sendText(res, method, 404, `404 Not Found: ${relPath}`);
  };
}

export function createStaticServer(root: string): http.Server {
  return http.createServer(createRequestHandler(root));
}

/**
 * Start serving `dir` on `port` (0 picks a free one). Resolves once listening.
 */
export function startStaticServer(options: { dir: string; port: number; host?: string }): Promise<http.Server> {
  if (!fs.existsSync(options.dir)) {
    console.warn(`⚠️  Serve directory does not exist: ${path.resolve(options.dir)}`);
    console.warn('   Run `trace-report generate` first to produce the report.');
  }

  const server = createStaticServer(options.dir);
  return new Promise((resolve, reject) => {
    server.once('error', reject);
    server.listen(options.port, options.host, () => {
      server.off('error', reject);
      resolve(server);
    });
  });
}

export function stopStaticServer(server: http.Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close(err => (err ? reject(err) : resolve()));
  });
}
