import path from 'node:path';
import process from 'node:process';

type Writable = Pick<NodeJS.WritableStream, 'write'>;

type IoStreams = {
  stdout: Writable;
  stderr: Writable;
};

type ParsedArgs = {
  url: string;
  timeoutMs: number;
  pretty: boolean;
  help: boolean;
  errors: string[];
};

export type HealthcheckResult = {
  healthy: boolean;
  status: number | null;
  cameraStatus: string | null;
  severity: string | null;
  activeClients: number | null;
  degradedChecks: string[];
  error?: string;
};

const DEFAULT_URL = 'http://127.0.0.1:8000/status';
const DEFAULT_TIMEOUT_MS = 3000;

function printUsage(target: Writable) {
  target.write(
    [
      'Camera relay healthcheck',
      '',
      'Usage:',
      '  node dist/scripts/healthcheck.js [--url <status url>] [--timeout <ms>] [--pretty]',
      '',
      'Options:',
      `  -u, --url <url>      Status endpoint to check (default ${DEFAULT_URL})`,
      `  -t, --timeout <ms>   Give up after this many milliseconds (default ${DEFAULT_TIMEOUT_MS})`,
      '  --pretty             Pretty-print JSON output with indentation',
      '  -h, --help           Show this help message',
      '',
      'Exits 0 while the camera is running, reset severity is below critical',
      'and no registered health check reports degraded.'
    ].join('\n') + '\n'
  );
}

function parseArgs(argv: string[]): ParsedArgs {
  const parsed: ParsedArgs = {
    url: DEFAULT_URL,
    timeoutMs: DEFAULT_TIMEOUT_MS,
    pretty: false,
    help: false,
    errors: []
  };

  for (let index = 0; index < argv.length; index += 1) {
    const token = argv[index];
    if (!token) {
      continue;
    }

    switch (token) {
      case '--url':
      case '-u': {
        const next = argv[index + 1];
        if (!next) {
          parsed.errors.push(`Missing value for ${token}`);
        } else {
          parsed.url = next;
          index += 1;
        }
        break;
      }
      case '--timeout':
      case '-t': {
        const next = argv[index + 1];
        const value = Number(next);
        if (!next || !Number.isFinite(value) || value <= 0) {
          parsed.errors.push(`Invalid value for ${token}`);
        } else {
          parsed.timeoutMs = value;
        }
        index += 1;
        break;
      }
      case '--pretty':
      case '-p':
        parsed.pretty = true;
        break;
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      default:
        parsed.errors.push(`Unknown option: ${token}`);
        break;
    }
  }

  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readDegradedChecks(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .filter(isRecord)
    .filter(check => check.status === 'degraded')
    .map(check => (typeof check.name === 'string' ? check.name : 'unnamed'));
}

function readString(source: Record<string, unknown>, key: string): string | null {
  const value = source[key];
  return typeof value === 'string' ? value : null;
}

export function evaluateStatus(httpStatus: number, payload: unknown): HealthcheckResult {
  if (!isRecord(payload)) {
    return {
      healthy: false,
      status: httpStatus,
      cameraStatus: null,
      severity: null,
      activeClients: null,
      degradedChecks: [],
      error: 'Status payload is not a JSON object'
    };
  }

  const cameraStatus = readString(payload, 'camera_status');
  const health = isRecord(payload.health) ? payload.health : {};
  const severity = readString(health, 'severity');
  const activeClients = typeof payload.active_clients === 'number' ? payload.active_clients : null;
  const degradedChecks = readDegradedChecks(payload.checks);

  return {
    healthy:
      httpStatus === 200 && cameraStatus === 'running' && severity !== 'critical' && degradedChecks.length === 0,
    status: httpStatus,
    cameraStatus,
    severity,
    activeClients,
    degradedChecks
  };
}

export async function fetchStatus(url: string, timeoutMs: number, fetchImpl: typeof fetch = fetch): Promise<HealthcheckResult> {
  try {
    const response = await fetchImpl(url, { signal: AbortSignal.timeout(timeoutMs) });
    const payload: unknown = await response.json();
    return evaluateStatus(response.status, payload);
  } catch (error) {
    return {
      healthy: false,
      status: null,
      cameraStatus: null,
      severity: null,
      activeClients: null,
      degradedChecks: [],
      error: error instanceof Error ? error.message : String(error)
    };
  }
}

export async function runHealthcheck(
  argv: string[],
  streams: IoStreams = { stdout: process.stdout, stderr: process.stderr },
  fetchImpl: typeof fetch = fetch
): Promise<number> {
  const args = parseArgs(argv);
  if (args.errors.length > 0) {
    args.errors.forEach(error => {
      streams.stderr.write(`${error}\n`);
    });
    printUsage(streams.stdout);
    return 1;
  }

  if (args.help) {
    printUsage(streams.stdout);
    return 0;
  }

  const result = await fetchStatus(args.url, args.timeoutMs, fetchImpl);
  const output = args.pretty ? JSON.stringify(result, null, 2) : JSON.stringify(result);
  streams.stdout.write(`${output}\n`);
  return result.healthy ? 0 : 1;
}

const scriptName = path.basename(process.argv[1] ?? '');

if (scriptName === 'healthcheck.ts' || scriptName === 'healthcheck.js') {
  runHealthcheck(process.argv.slice(2))
    .then(code => {
      process.exitCode = code;
    })
    .catch(error => {
      process.stderr.write(`Healthcheck failed: ${error instanceof Error ? error.message : String(error)}\n`);
      process.exitCode = 1;
    });
}
