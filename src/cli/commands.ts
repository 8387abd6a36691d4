/**
 * slotswap command dispatch.
 *
 * Usage:
 *   slotswap deploy <artifact>       Stage an artifact and promote it
 *   slotswap redeploy <release-id>   Promote an already staged release
 *   slotswap status                  Live slot, bound releases, catalog
 *   slotswap prune                   Apply release retention
 *   slotswap stop <A|B|label>        Stop one slot's process
 *
 * Reports are written to stdout as JSON; logs go to stderr.
 */

import { destination, type Logger } from 'pino';
import { loadConfig, type ConfigEnvironment } from '../config/loader.js';
import { Deployer } from '../api/deployer.js';
import { DeployError, errorMessage } from '../api/errors.js';
import { DeployExitCode } from '../types/release.js';
import { isSlotId, SLOT_IDS, type SlotId } from '../types/slot.js';
import type { DeployConfig } from '../types/schemas/config.js';
import { createLogger } from '../utils/logger.js';

export const VERSION = '0.1.0';

/** Bad invocation (unknown command, missing argument) */
export const USAGE_EXIT_CODE = 64;

export interface CliArgs {
  _: string[];
  flags: Record<string, string | true>;
}

export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Cancels a running deployment (wired to SIGINT/SIGTERM by the binary) */
  signal?: AbortSignal;
  createLogger?: (config: DeployConfig) => Logger;
  createDeployer?: (config: DeployConfig, logger: Logger) => Deployer;
}

const BOOLEAN_FLAGS = new Set(['help', 'version', 'force', 'live']);
const ENVIRONMENTS: readonly ConfigEnvironment[] = ['production', 'development', 'test'];

export function parseArgs(argv: readonly string[]): CliArgs {
  const result: CliArgs = { _: [], flags: {} };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === undefined) {
      continue;
    }

    if (arg.startsWith('--')) {
      const [key, inline] = arg.slice(2).split('=', 2);
      if (key === undefined || key.length === 0) {
        continue;
      }
      const next = argv[i + 1];

      if (inline !== undefined) {
        result.flags[key] = inline;
      } else if (!BOOLEAN_FLAGS.has(key) && next !== undefined && !next.startsWith('--')) {
        result.flags[key] = next;
        i++;
      } else {
        result.flags[key] = true;
      }
    } else {
      result._.push(arg);
    }
  }

  return result;
}

export const HELP_TEXT = `
slotswap - blue-green releases for a single host

USAGE:
  slotswap <command> [options]

COMMANDS:
  deploy <artifact>          Stage a .tar.gz or directory and promote it
  redeploy <release-id>      Promote a kept release (manual rollback)
  status                     Show live slot, bound releases and catalog
  prune                      Remove releases beyond release.keep_releases
  stop <A|B|label>           Stop one slot's process
    --force                  Skip graceful shutdown
    --live                   Allow stopping the live slot

OPTIONS:
  --config <path>            Configuration file (default: ./slotswap.yaml)
  --env <name>               Environment block: production|development|test
  --help                     Show this help
  --version                  Show version

EXIT CODES:
  0  promoted
  1  aborted before promotion (production untouched)
  2  promoted, but post-promotion cleanup failed
`;

function flagString(args: CliArgs, name: string): string | undefined {
  const value = args.flags[name];
  return typeof value === 'string' ? value : undefined;
}

function resolveSlot(config: DeployConfig, value: string): SlotId | null {
  const upper = value.toUpperCase();
  if (isSlotId(upper)) {
    return upper;
  }
  if (config.slots.a.label === value) {
    return 'A';
  }
  if (config.slots.b.label === value) {
    return 'B';
  }
  return null;
}

function writeJson(io: CliIO, value: unknown): void {
  io.stdout(`${JSON.stringify(value, null, 2)}\n`);
}

/**
 * Run one CLI invocation and return the process exit code.
 */
export async function runCli(argv: readonly string[], io: CliIO): Promise<number> {
  const args = parseArgs(argv);
  const [command, operand] = args._;

  if (args.flags.version === true) {
    io.stdout(`slotswap v${VERSION}\n`);
    return 0;
  }
  if (args.flags.help === true || command === undefined) {
    io.stdout(HELP_TEXT);
    return command === undefined && args.flags.help !== true ? USAGE_EXIT_CODE : 0;
  }

  const environment = flagString(args, 'env');
  if (environment !== undefined && !ENVIRONMENTS.some((e) => e === environment)) {
    io.stderr(`Unknown environment: ${environment}\n`);
    return USAGE_EXIT_CODE;
  }

  let config: DeployConfig;
  try {
    config = loadConfig({
      configPath: flagString(args, 'config'),
      environment: ENVIRONMENTS.find((e) => e === environment),
      env: io.env,
      cwd: io.cwd,
    });
  } catch (error) {
    io.stderr(`${errorMessage(error)}\n`);
    return DeployExitCode.ABORTED;
  }

  const logger = io.createLogger?.(config) ?? createLogger(config.logging.level, destination(2));
  const deployer = io.createDeployer?.(config, logger) ?? new Deployer({ config, logger });

  try {
    switch (command) {
      case 'deploy':
      case 'redeploy': {
        if (operand === undefined) {
          io.stderr(`Missing ${command === 'deploy' ? 'artifact path' : 'release id'}\n`);
          return USAGE_EXIT_CODE;
        }
        const report =
          command === 'deploy'
            ? await deployer.deploy(operand, { signal: io.signal })
            : await deployer.redeploy(operand, { signal: io.signal });
        writeJson(io, report);
        return report.exitCode;
      }

      case 'status':
        writeJson(io, await deployer.status());
        return 0;

      case 'prune':
        writeJson(io, await deployer.prune());
        return 0;

      case 'stop': {
        const slotId = operand === undefined ? null : resolveSlot(config, operand);
        if (slotId === null) {
          io.stderr(`stop needs one of: ${SLOT_IDS.join(', ')}, ${config.slots.a.label}, ${config.slots.b.label}\n`);
          return USAGE_EXIT_CODE;
        }
        const slot = await deployer.stop(slotId, {
          force: args.flags.force === true,
          allowLive: args.flags.live === true,
        });
        writeJson(io, { stopped: slot.id, label: slot.label, port: slot.port });
        return 0;
      }

      default:
        io.stderr(`Unknown command: ${command}\n${HELP_TEXT}`);
        return USAGE_EXIT_CODE;
    }
  } catch (error) {
    const shape =
      error instanceof DeployError ? error.toObject() : { code: 'UnknownError', message: errorMessage(error) };
    logger.error({ err: error }, 'Command failed');
    writeJson(io, { error: shape });
    return DeployExitCode.ABORTED;
  }
}
