import yargs from 'yargs';
import { ConfigError } from './errors';

export interface HttpsConfig {
  port: number;
  crtPath: string;
  keyPath: string;
}

export interface ServerConfig {
  host: string;
  httpPort: number;
  /** Present only when HTTPS is enabled */
  https?: HttpsConfig;
}

export const DEFAULT_HTTP_PORT = 8080;

function isPort(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 && value <= 65535;
}

function readArgs(args: string[], version: string) {
  return yargs(args)
    .scriptName('pipe-relay')
    .option('host', {
      type: 'string',
      description: 'Address to bind',
      default: '0.0.0.0',
    })
    .option('http-port', {
      type: 'number',
      description: 'HTTP port',
      default: DEFAULT_HTTP_PORT,
    })
    .option('enable-https', {
      type: 'boolean',
      description: 'Enable HTTPS',
      default: false,
    })
    .option('https-port', {
      type: 'number',
      description: 'HTTPS port',
    })
    .option('crt-path', {
      type: 'string',
      description: 'Certification path',
    })
    .option('key-path', {
      type: 'string',
      description: 'Private key path',
    })
    .check((parsed) => {
      if (!isPort(parsed.httpPort)) {
        throw new Error(`Invalid --http-port: ${String(parsed.httpPort)}`);
      }
      if (parsed.httpsPort !== undefined && !isPort(parsed.httpsPort)) {
        throw new Error(`Invalid --https-port: ${String(parsed.httpsPort)}`);
      }
      if (parsed.enableHttps && (parsed.httpsPort === undefined || !parsed.crtPath || !parsed.keyPath)) {
        throw new Error('--https-port, --crt-path and --key-path should be specified');
      }
      return true;
    })
    .strict()
    .version(version)
    .help()
    .fail(false)
    .parseSync();
}

/**
 * Parses command-line arguments (without the node and script entries).
 * @throws {ConfigError} on unknown options, bad ports, or incomplete HTTPS settings.
 */
export function parseConfig(args: string[], version = '0.0.0'): ServerConfig {
  let argv: ReturnType<typeof readArgs>;
  try {
    argv = readArgs(args, version);
  } catch (err) {
    throw new ConfigError(err instanceof Error ? err.message : String(err));
  }

  const config: ServerConfig = { host: argv.host, httpPort: argv.httpPort };
  if (argv.enableHttps && argv.httpsPort !== undefined && argv.crtPath && argv.keyPath) {
    config.https = { port: argv.httpsPort, crtPath: argv.crtPath, keyPath: argv.keyPath };
  }
  return config;
}
