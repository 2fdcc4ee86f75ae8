import escapeHtml from 'escape-html';
import type { Request, RequestHandler } from 'express';
import { HTML, PLAIN_TEXT } from './respond';

export const reservedPaths = {
  index: '/',
  noscript: '/noscript',
  version: '/version',
  help: '/help',
  robots: '/robots.txt',
  favicon: '/favicon.ico',
} as const;

const RESERVED = new Set<string>(Object.values(reservedPaths));

export function isReservedPath(path: string): boolean {
  return RESERVED.has(path);
}

export interface ReservedContent {
  version: string;
  indexHtml: string;
}

function baseUrl(req: Request): string {
  return `${req.protocol}://${req.get('host') ?? 'localhost'}`;
}

export function helpText(url: string, version: string): string {
  return `Help for pipe-relay ${version}

======= Get  =======
curl ${url}/mypath

======= Send =======
# Send a file
curl -T myfile ${url}/mypath

# Send a text
echo 'hello!' | curl -T - ${url}/mypath

# Send a directory (zip)
zip -q -r - ./mydir | curl -T - ${url}/mypath

# Send a directory (tar.gz)
tar zfcp - ./mydir | curl -T - ${url}/mypath

# Send to 3 receivers (each of them runs: curl ${url}/mypath?n=3)
curl -T myfile '${url}/mypath?n=3'

# Encryption
## Send
cat myfile | openssl aes-256-cbc | curl -T - ${url}/mypath
## Get
curl ${url}/mypath | openssl aes-256-cbc -d
`;
}

/**
 * Page for browsers without JavaScript: picks a path, links to it for
 * download and shows the command that sends to it. It has no upload form.
 * `path` comes from the query string and is escaped before it reaches the
 * markup.
 */
export function noscriptHtml(path: string, url: string): string {
  const escaped = escapeHtml(path);
  const target = path.startsWith('/') ? path : `/${path}`;
  const transfer =
    path === ''
      ? ''
      : `
  <h3>Receive</h3>
  <p><a href="${escapeHtml(target)}">${escapeHtml(url + target)}</a></p>
  <h3>Send from a terminal</h3>
  <p>This page cannot upload. Run:</p>
  <pre>curl -T myfile ${escapeHtml(url + target)}</pre>`;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>pipe-relay: receive without JavaScript</title>
</head>
<body>
  <h2>Receive without JavaScript</h2>
  <form method="GET" action="/noscript">
    <label>Path <input name="path" value="${escaped}" placeholder="/mypath"></label>
    <button type="submit">Use this path</button>
  </form>${transfer}
</body>
</html>
`;
}

function queryString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

export function createReservedHandlers(content: ReservedContent): Record<keyof typeof reservedPaths, RequestHandler> {
  return {
    index: (_req, res) => {
      res.status(200).type(HTML).send(content.indexHtml);
    },
    noscript: (req, res) => {
      res.status(200).type(HTML).send(noscriptHtml(queryString(req.query.path), baseUrl(req)));
    },
    version: (_req, res) => {
      res.status(200).type(PLAIN_TEXT).send(`${content.version}\n`);
    },
    help: (req, res) => {
      res.status(200).type(PLAIN_TEXT).send(helpText(baseUrl(req), content.version));
    },
    robots: (_req, res) => {
      res.status(404).end();
    },
    favicon: (_req, res) => {
      res.status(204).end();
    },
  };
}
