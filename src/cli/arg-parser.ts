import { DEFAULT_HOST, DEFAULT_PORT } from '../config/constants.js';
import { LOG_LEVELS, isLogLevel } from '../infrastructure/logging/logger.js';
import type { ParsedArgs, RoutesCommandOptions } from './types.js';

class ArgumentParser {
  private args: Omit<ParsedArgs, '_provided'>;
  private provided: Record<string, boolean>;

  constructor() {
    this.args = this.createDefaultArgs();
    this.provided = this.createProvidedTracker();
  }

  private createDefaultArgs(): Omit<ParsedArgs, '_provided'> {
    return {
      port: DEFAULT_PORT,
      host: DEFAULT_HOST,
      listen: null,
      routes: [],
      logLevel: null,
      exposeErrors: false,
      maxBodySize: null,
      help: false,
      version: false,
    };
  }

  private createProvidedTracker(): Record<string, boolean> {
    return {
      port: false,
      host: false,
      listen: false,
      routes: false,
      logLevel: false,
      exposeErrors: false,
      maxBodySize: false,
    };
  }

  private requireValue(token: string, value: string | undefined): string {
    if (!value) {
      throw new Error(`Expected value after ${token}`);
    }
    return value;
  }

  private requireNonEmpty(value: string, fieldName: string): string {
    const trimmed = value.trim();
    if (!trimmed) {
      throw new Error(`${fieldName} cannot be empty`);
    }
    return trimmed;
  }

  private parsePort(value: string): number {
    const parsed = Number.parseInt(value, 10);
    if (!Number.isInteger(parsed) || parsed < 1 || parsed > 65535) {
      throw new Error(`Invalid port: ${value}`);
    }
    return parsed;
  }

  private parseMaxBodySize(value: string): number {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < 1) {
      throw new Error(`Invalid max body size: ${value}`);
    }
    return parsed;
  }

  private parseLogLevel(value: string): ParsedArgs['logLevel'] {
    const lower = value.trim().toLowerCase();
    if (!isLogLevel(lower)) {
      throw new Error(`Invalid log level "${value}". Expected one of: ${LOG_LEVELS.join(', ')}`);
    }
    return lower;
  }

  parse(argv: string[]): ParsedArgs {
    for (let i = 0; i < argv.length; i += 1) {
      const token = argv[i];

      switch (token) {
        case '--port':
        case '-p': {
          const value = this.requireValue(token, argv[++i]);
          this.args.port = this.parsePort(value);
          this.provided['port'] = true;
          break;
        }
        case '--host':
        case '-H': {
          this.args.host = this.requireNonEmpty(this.requireValue(token, argv[++i]), 'Host');
          this.provided['host'] = true;
          break;
        }
        case '--listen':
        case '-l': {
          this.args.listen = this.requireNonEmpty(this.requireValue(token, argv[++i]), 'Listen address');
          this.provided['listen'] = true;
          break;
        }
        case '--routes':
        case '-r': {
          const value = this.requireValue(token, argv[++i]);
          this.args.routes.push(this.requireNonEmpty(value, 'Routes module'));
          this.provided['routes'] = true;
          break;
        }
        case '--log-level': {
          const value = this.requireValue(token, argv[++i]);
          this.args.logLevel = this.parseLogLevel(value);
          this.provided['logLevel'] = true;
          break;
        }
        case '--expose-errors': {
          this.args.exposeErrors = true;
          this.provided['exposeErrors'] = true;
          break;
        }
        case '--max-body-size': {
          const value = this.requireValue(token, argv[++i]);
          this.args.maxBodySize = this.parseMaxBodySize(value);
          this.provided['maxBodySize'] = true;
          break;
        }
        case '--help':
        case '-h':
          this.args.help = true;
          break;
        case '--version':
        case '-v':
          this.args.version = true;
          break;
        default:
          if (token && token.startsWith('-')) {
            throw new Error(`Unknown option: ${token}`);
          } else {
            throw new Error(`Unexpected argument: ${token}`);
          }
      }
    }

    if (this.provided['listen'] && (this.provided['host'] || this.provided['port'])) {
      throw new Error('--listen cannot be combined with --host or --port');
    }

    return {
      ...this.args,
      _provided: this.provided,
    };
  }
}

export function parseArgs(argv: string[]): ParsedArgs {
  const parser = new ArgumentParser();
  return parser.parse(argv);
}

export function parseRoutesCommandArgs(argv: string[]): RoutesCommandOptions {
  const options: RoutesCommandOptions = { routes: [], help: false };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    switch (token) {
      case '--routes':
      case '-r': {
        const value = argv[++i];
        if (!value || !value.trim()) {
          throw new Error(`Expected value after ${token}`);
        }
        options.routes.push(value.trim());
        break;
      }
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new Error(`Unknown option for routes command: ${token}`);
    }
  }

  return options;
}
