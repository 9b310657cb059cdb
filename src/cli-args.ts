/**
 * Command-line argument parsing for the drift-lab CLI
 */

import type { DistanceMetric } from './engine/analysis/distance.js';

export type CliCommand =
  | { name: 'experiment'; agents?: string[]; ratesPercent?: number[]; sentences?: number; seed?: number; chainAttempts?: number }
  | { name: 'stats' }
  | { name: 'analyze'; metric: DistanceMetric }
  | { name: 'sentences'; save?: string }
  | { name: 'help' };

export const USAGE = `Usage: drift-lab <command> [options]

Commands:
  experiment   Run a sweep (rates × sentences × agents)
      --agents <a,b>     Agent ids (default: AGENTS)
      --rates <0,25,50>  Error rates in percent (default: ERROR_RATES)
      --sentences <n>    Number of corpus sentences (default: SENTENCE_COUNT)
      --seed <n>         Sweep seed (default: EXPERIMENT_SEED)
      --attempts <n>     Chain executions per trial (default: CHAIN_ATTEMPTS)
  stats        Stored trial counts
  analyze      Distance statistics and error-rate correlation
      --metric <cosine|euclidean|manhattan>
  sentences    Show the sentence corpus
      --save <path>      Write the corpus to a JSON file
`;

const METRICS: readonly DistanceMetric[] = ['cosine', 'euclidean', 'manhattan'];

function requireNext(argv: readonly string[], index: number, flag: string): string {
  const value = argv[index + 1];
  if (!value || value.startsWith('--')) {
    throw new Error(`Missing value for ${flag}`);
  }
  return value;
}

function parseList(raw: string, flag: string): string[] {
  const items = raw
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
  if (items.length === 0) {
    throw new Error(`${flag} requires at least one value`);
  }
  return items;
}

function parseInteger(raw: string, flag: string, min: number): number {
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isInteger(parsed) || parsed < min || String(parsed) !== raw.trim()) {
    throw new Error(`Invalid ${flag} '${raw}'. Expected integer >= ${min}.`);
  }
  return parsed;
}

function parseRates(raw: string): number[] {
  return parseList(raw, '--rates').map((item) => {
    const value = Number(item);
    if (!Number.isFinite(value) || value < 0 || value > 100) {
      throw new Error(`Invalid rate '${item}'. Expected a percentage between 0 and 100.`);
    }
    return value;
  });
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;

  if (command === undefined || command === 'help' || command === '--help' || command === '-h') {
    return { name: 'help' };
  }

  if (command === 'stats') {
    if (rest.length > 0) throw new Error(`Unknown argument: ${rest[0]}`);
    return { name: 'stats' };
  }

  if (command === 'analyze') {
    let metric: DistanceMetric = 'cosine';
    for (let i = 0; i < rest.length; i += 1) {
      if (rest[i] === '--metric') {
        const value = requireNext(rest, i, '--metric');
        const found = METRICS.find((m) => m === value);
        if (!found) {
          throw new Error(`Invalid --metric '${value}'. Expected ${METRICS.join('|')}.`);
        }
        metric = found;
        i += 1;
        continue;
      }
      throw new Error(`Unknown argument: ${rest[i]}`);
    }
    return { name: 'analyze', metric };
  }

  if (command === 'sentences') {
    let save: string | undefined;
    for (let i = 0; i < rest.length; i += 1) {
      if (rest[i] === '--save') {
        save = requireNext(rest, i, '--save');
        i += 1;
        continue;
      }
      throw new Error(`Unknown argument: ${rest[i]}`);
    }
    return { name: 'sentences', save };
  }

  if (command === 'experiment') {
    const result: Extract<CliCommand, { name: 'experiment' }> = { name: 'experiment' };
    for (let i = 0; i < rest.length; i += 1) {
      const arg = rest[i];
      if (arg === '--agents') {
        result.agents = parseList(requireNext(rest, i, arg), arg).map((id) => id.toLowerCase());
      } else if (arg === '--rates') {
        result.ratesPercent = parseRates(requireNext(rest, i, arg));
      } else if (arg === '--sentences') {
        result.sentences = parseInteger(requireNext(rest, i, arg), arg, 1);
      } else if (arg === '--seed') {
        result.seed = parseInteger(requireNext(rest, i, arg), arg, 0);
      } else if (arg === '--attempts') {
        result.chainAttempts = parseInteger(requireNext(rest, i, arg), arg, 1);
      } else {
        throw new Error(`Unknown argument: ${arg}`);
      }
      i += 1;
    }
    return result;
  }

  throw new Error(`Unknown command: ${command}`);
}
