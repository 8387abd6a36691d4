/**
 * nginx site configuration renderer.
 */

import type { ProxyBackend } from './reverse-proxy.js';

export interface NginxSiteOptions {
  appName: string;
  upstreamHost: string;
  listenPort: number;
  serverNames: readonly string[];
  keepalive: number;
  staticUrlPrefix: string;
  cacheMaxAge: number;
}

const UPSTREAM_SERVER_PATTERN = /^\s*server\s+[^;\s]+:(\d+)\s*;/m;

export function upstreamName(appName: string): string {
  return `${appName.replace(/[^a-zA-Z0-9_]/g, '_')}_backend`;
}

export function renderNginxSite(options: NginxSiteOptions, backend: ProxyBackend): string {
  const upstream = upstreamName(options.appName);
  const serverName = options.serverNames.length > 0 ? options.serverNames.join(' ') : '_';
  const lines = [
    '# Managed by slotswap; rewritten on every cutover.',
    '',
    'map $http_upgrade $connection_upgrade {',
    '    default upgrade;',
    "    '' close;",
    '}',
    '',
    `upstream ${upstream} {`,
    `    server ${options.upstreamHost}:${backend.port};`,
  ];
  if (options.keepalive > 0) {
    lines.push(`    keepalive ${options.keepalive};`);
  }
  lines.push(
    '}',
    '',
    'server {',
    `    listen ${options.listenPort};`,
    `    listen [::]:${options.listenPort};`,
    `    server_name ${serverName};`,
    '',
    `    location ${options.staticUrlPrefix} {`,
    `        alias ${backend.staticRoot};`,
    `        expires ${options.cacheMaxAge}s;`,
    `        add_header Cache-Control "public, max-age=${options.cacheMaxAge}, immutable";`,
    '        access_log off;',
    '    }',
    '',
    '    location / {',
    `        proxy_pass http://${upstream};`,
    '        proxy_http_version 1.1;',
    '        proxy_set_header Upgrade $http_upgrade;',
    '        proxy_set_header Connection $connection_upgrade;',
    '        proxy_set_header Host $host;',
    '        proxy_set_header X-Real-IP $remote_addr;',
    '        proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;',
    '        proxy_set_header X-Forwarded-Proto $scheme;',
    '    }',
    '}',
    ''
  );
  return lines.join('\n');
}

/**
 * Backend port named by a rendered site, or null.
 */
export function parseUpstreamPort(content: string): number | null {
  const match = UPSTREAM_SERVER_PATTERN.exec(content);
  if (!match?.[1]) {
    return null;
  }
  return Number.parseInt(match[1], 10);
}
