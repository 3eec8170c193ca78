/**
 * CLI argument parsing, coercions, and help text.
 */

import type { ChatscopeConfig } from '../config.js';

export type ParsedArgs = {
  _: string[];
  flags: Record<string, string | boolean>;
};

/** Convert raw errors into user-friendly messages (no stack traces). */
export function friendlyError(e: unknown): string {
  const msg = e instanceof Error ? e.message : String(e);
  const name = e instanceof Error ? e.name : '';
  if (name === 'AbortError' || msg.includes('aborted')) {
    return 'Aborted.';
  }
  if (msg.includes('connection refused') || msg.includes('ECONNREFUSED')) {
    return `Connection failed: ${msg}. Is the server running?`;
  }
  if (msg.includes(': 401 ') || msg.includes(': 403 ')) {
    return `Request rejected: ${msg}. Check --api-key or CHATSCOPE_API_KEY.`;
  }
  return msg;
}

// Flags that are always boolean (never consume the next positional arg as their value)
const BOOLEAN_FLAGS = new Set([
  'help',
  'verbose',
  'no-stream',
  'record-events',
  'record-content',
]);

const SHORT_ALIASES: Record<string, string> = {
  h: 'help',
  m: 'model',
  s: 'system',
};

export function parseArgs(argv: string[]): ParsedArgs {
  const out: ParsedArgs = { _: [], flags: {} };
  for (let i = 0; i < argv.length; i++) {
    const a = argv[i];
    if (a === '--') {
      out._.push(...argv.slice(i + 1));
      break;
    }
    if (!a.startsWith('-') || a === '-') {
      out._.push(a);
      continue;
    }

    let key: string;
    let value: string | undefined;
    if (a.startsWith('--')) {
      const eq = a.indexOf('=');
      key = eq === -1 ? a.slice(2) : a.slice(2, eq);
      value = eq === -1 ? undefined : a.slice(eq + 1);
    } else {
      const short = a.slice(1);
      key = SHORT_ALIASES[short] ?? short;
    }

    if (value !== undefined) {
      out.flags[key] = value;
    } else if (BOOLEAN_FLAGS.has(key)) {
      out.flags[key] = true;
    } else {
      const next = argv[i + 1];
      if (next !== undefined && !next.startsWith('-')) {
        out.flags[key] = next;
        i++;
      } else {
        out.flags[key] = true;
      }
    }
  }
  return out;
}

export function asNum(v: string | boolean | undefined): number | undefined {
  if (typeof v !== 'string' || v.trim() === '') return undefined;
  const n = Number(v);
  return Number.isFinite(n) ? n : undefined;
}

export function asBool(v: string | boolean | undefined): boolean | undefined {
  if (v === undefined) return undefined;
  if (typeof v === 'boolean') return v;
  if (['1', 'true', 'yes', 'on'].includes(v.toLowerCase())) return true;
  if (['0', 'false', 'no', 'off'].includes(v.toLowerCase())) return false;
  return undefined;
}

export function asString(v: string | boolean | undefined): string | undefined {
  return typeof v === 'string' ? v : undefined;
}

/** Config overrides named on the command line. Unset flags stay undefined. */
export function cliOverrides(args: ParsedArgs): Partial<ChatscopeConfig> {
  const f = args.flags;
  return {
    endpoint: asString(f.endpoint),
    model: asString(f.model),
    api_key: asString(f['api-key']),
    system_prompt: asString(f.system),
    max_tokens: asNum(f['max-tokens']),
    temperature: asNum(f.temperature),
    top_p: asNum(f['top-p']),
    stream: f['no-stream'] === true ? false : undefined,
    record_events: asBool(f['record-events']),
    record_content: asBool(f['record-content']),
    verbose: asBool(f.verbose),
  };
}

export function printHelp(): void {
  console.log(`Usage: chatscope [options] <prompt>

Sends one chat completion and prints the reply. Streams by default.

Options:
  --endpoint URL          Base URL including the API version (default http://localhost:8080/v1)
  -m, --model NAME
  --api-key KEY
  -s, --system TEXT       System prompt
  --max-tokens N
  --temperature F
  --top-p F
  --no-stream             Use a unary request instead of streaming
  --record-events         Write per-message and per-choice span events
  --record-content        Keep message text in span events instead of REDACTED
  --verbose               Log requests and print the call report to stderr
  --config PATH           Config file (default ~/.config/chatscope/config.json)
  -h, --help

Environment:
  CHATSCOPE_ENDPOINT, CHATSCOPE_API_KEY, CHATSCOPE_MODEL, CHATSCOPE_TELEMETRY,
  CHATSCOPE_RECORD_EVENTS, CHATSCOPE_RECORD_CONTENT, CHATSCOPE_VERBOSE,
  CHATSCOPE_QUIET_WARNINGS`);
}
