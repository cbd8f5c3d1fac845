import { parseArgs } from 'node:util';
import { CONFIG, type AppConfig } from './config.js';
import { CliArgsSchema, type CliArgs } from './domain/schemas.js';
import { resolveRoles } from './domain/intent.js';
import { derive } from './engine/calculator.js';
import { buildInsights } from './engine/insights.js';
import { paletteFor, renderBanner, renderReport } from './presenter.js';
import { logDebug, logError } from './utils/logger.js';

export interface CliIO {
  out: (text: string) => void;
  err: (text: string) => void;
}

const consoleIO: CliIO = {
  out: (text) => console.log(text),
  err: (text) => console.error(text)
};

export const USAGE = `Usage: pacecalc <first_value> <in|at> <second_value> [--no-color]

Calculate pace, time, or distance from the other two.

Examples:
  pacecalc 10km in 45:00        # pace for 10km in 45 minutes
  pacecalc marathon at 4:30     # time for a marathon at 4:30 min/km
  pacecalc 1:30:00 at 5:00      # distance for 1:30:00 at 5:00 min/km

Distance formats: 5km, 10k, 21.0975km, marathon, half-marathon, 1mi
Time formats: 45:00, 1:30:00, 1h30m, 90m
Pace formats: 4:30, 5.5 (minutes per kilometer)

Options:
  --no-color    disable colored output (also NO_COLOR=1)
  -h, --help    show this help`;

type ArgsOutcome =
  | { kind: 'help' }
  | { kind: 'args'; args: CliArgs }
  | { kind: 'error'; message: string };

function tokenize(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      'no-color': { type: 'boolean' },
      help: { type: 'boolean', short: 'h' }
    },
    allowPositionals: true
  });
}

export function readArgs(argv: string[]): ArgsOutcome {
  let parsed: ReturnType<typeof tokenize>;
  try {
    parsed = tokenize(argv);
  } catch (err) {
    return { kind: 'error', message: err instanceof Error ? err.message : String(err) };
  }

  const { values, positionals } = parsed;
  if (values.help) return { kind: 'help' };
  if (positionals.length !== 3) {
    return { kind: 'error', message: `expected <first_value> <in|at> <second_value>, got ${positionals.length} argument(s)` };
  }

  const [first_value, preposition, second_value] = positionals;
  const result = CliArgsSchema.safeParse({
    first_value,
    preposition: preposition.toLowerCase(),
    second_value,
    no_color: values['no-color'] ?? false
  });
  if (!result.success) {
    const issue = result.error.issues[0];
    return { kind: 'error', message: `${issue.path.join('.')}: ${issue.message}` };
  }
  return { kind: 'args', args: result.data };
}

export function run(argv: string[], config: AppConfig = CONFIG, io: CliIO = consoleIO): number {
  // Arguments may be unparsable, so errors before parsing check the raw flag
  const c = paletteFor(config.color && !argv.includes('--no-color'));

  try {
    const outcome = readArgs(argv);
    if (outcome.kind === 'help') {
      io.out(USAGE);
      return 0;
    }
    if (outcome.kind === 'error') {
      io.err(`${c.error}Input Error: ${outcome.message}${c.reset}`);
      io.err(USAGE.split('\n')[0]);
      return 1;
    }

    const { first_value, preposition, second_value, no_color } = outcome.args;
    const palette = paletteFor(config.color && !no_color);
    const input = resolveRoles(first_value, preposition, second_value);
    const derived = derive(input);
    if (!derived.ok) {
      io.err(`${palette.error}Input Error: ${derived.error.message}${palette.reset}`);
      return 1;
    }

    const metrics = derived.value;
    if (config.debug) {
      logDebug('derived', {
        input,
        distance_km: metrics.distance_km,
        time_minutes: metrics.time_minutes,
        pace_min_per_km: metrics.pace_min_per_km
      });
    }

    io.out(renderBanner(palette));
    io.out(renderReport(metrics, buildInsights(metrics), palette));
    return 0;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logError('unexpected_error', { error: message });
    io.err(`${c.error}Unexpected error: ${message}${c.reset}`);
    return 1;
  }
}
