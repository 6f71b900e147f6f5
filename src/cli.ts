#!/usr/bin/env node
import { EJSON } from 'bson';
import { Ksuid, newKsuid } from './ksuid';

interface Writer {
  write(chunk: string | Uint8Array): unknown;
}

export interface Output {
  stdout: Writer;
  stderr: Writer;
}

export interface ParsedArgs {
  help: boolean;
  ndjson: boolean;
  verbose: boolean;
  count: number;
  format: string;
  template: string;
  positional: string[];
  error?: string;
}

type Printer = (id: Ksuid, args: ParsedArgs) => string | Uint8Array;

const TEMPLATE_FIELD = /\{\{\s*\.(\w+)\s*\}\}/g;

export function parseArgs (argv: string[]): ParsedArgs {
  const args: ParsedArgs = {
    help: false,
    ndjson: false,
    verbose: false,
    count: 1,
    format: 'string',
    template: '',
    positional: []
  };

  let i = 2; // Skip node and script path
  while (i < argv.length) {
    const arg = argv[i];

    if (arg === '--help' || arg === '-h') {
      args.help = true;
    } else if (arg === '--ndjson') {
      args.ndjson = true;
    } else if (arg === '-v') {
      args.verbose = true;
    } else if (arg === '-n' || arg === '-f' || arg === '-t') {
      if (i + 1 >= argv.length) {
        args.error ??= `flag needs an argument: ${arg}`;
      } else {
        const value = argv[++i];
        if (arg === '-f') {
          args.format = value;
        } else if (arg === '-t') {
          args.template = value;
        } else if (/^\d+$/.test(value)) {
          args.count = Number(value);
        } else {
          args.error ??= `invalid value ${JSON.stringify(value)} for flag -n`;
        }
      }
    } else if (arg.startsWith('-')) {
      args.error ??= `flag provided but not defined: ${arg}`;
    } else {
      args.positional.push(arg);
    }

    i++;
  }

  return args;
}

export function usage (): string {
  return `usage: ksuid [options] [ksuid...]

Generates KSUIDs, or inspects the ones given as arguments.

Options:
  --help, -h     Show this help message and exit
  -n <count>     Number of KSUIDs to generate when called with no other arguments (default: 1)
  -f <format>    One of string, inspect, time, timestamp, payload, raw, or template (default: string)
  -t <template>  Template used to format the output, e.g. '{{ .Time }} {{ .Payload }}'
  -v             Turn on verbose mode
  --ndjson       Output in newline-delimited JSON format
`;
}

function hex (bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('hex').toUpperCase();
}

function templateFields (id: Ksuid): Record<string, string> {
  return {
    String: id.toString(),
    Raw: hex(id.toBuffer()),
    Time: id.time.toISOString(),
    Timestamp: String(id.timestamp),
    Payload: hex(id.payload)
  };
}

export function renderTemplate (template: string, id: Ksuid): string {
  const fields = templateFields(id);
  return template.replace(TEMPLATE_FIELD, (_match, name: string) => {
    const value = fields[name];
    if (value === undefined) {
      throw new Error(`template: can't evaluate field ${name}`);
    }
    return value;
  });
}

function printInspect (id: Ksuid): string {
  const fields = templateFields(id);
  return `
REPRESENTATION:

  String: ${fields.String}
     Raw: ${fields.Raw}

COMPONENTS:

       Time: ${fields.Time}
  Timestamp: ${fields.Timestamp}
    Payload: ${fields.Payload}

`;
}

const printers: Record<string, Printer> = {
  string: (id) => `${id.toString()}\n`,
  inspect: (id) => printInspect(id),
  time: (id) => `${id.time.toISOString()}\n`,
  timestamp: (id) => `${id.timestamp}\n`,
  payload: (id) => id.payload,
  raw: (id) => id.toBuffer(),
  template: (id, args) => `${renderTemplate(args.template, id)}\n`
};

function utcnow (): string {
  return new Date().toISOString();
}

function ndjsonRecord (id: Ksuid): string {
  return EJSON.stringify({
    ts: utcnow(),
    ev: 'ksuid',
    string: id.toString(),
    raw: hex(id.toBuffer()),
    time: id.time,
    timestamp: id.timestamp,
    payload: hex(id.payload)
  });
}

export function main (argv: string[], io: Output = { stdout: process.stdout, stderr: process.stderr }): number {
  const args = parseArgs(argv);

  if (args.help) {
    io.stdout.write(usage());
    return 0;
  }

  if (args.error !== undefined) {
    io.stderr.write(`${args.error}\n${usage()}`);
    return 2;
  }

  const print = Object.prototype.hasOwnProperty.call(printers, args.format) ? printers[args.format] : undefined;
  if (!print) {
    io.stdout.write(`Bad formatting function: ${args.format}\n`);
    return 1;
  }

  const inputs = args.positional.length > 0
    ? args.positional
    : Array.from({ length: args.count }, () => newKsuid().toString());

  const ids: Ksuid[] = [];
  for (const arg of inputs) {
    try {
      ids.push(Ksuid.parse(arg));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      if (args.ndjson) {
        io.stdout.write(`${JSON.stringify({ ts: utcnow(), ev: 'error', arg, err: message })}\n`);
      } else {
        io.stdout.write(`Error when parsing ${JSON.stringify(arg)}: ${message}\n\n`);
        io.stderr.write(usage());
      }
      return 1;
    }
  }

  for (const id of ids) {
    if (args.ndjson) {
      io.stdout.write(`${ndjsonRecord(id)}\n`);
      continue;
    }

    let line: string | Uint8Array;
    try {
      line = print(id, args);
    } catch (err) {
      io.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
      return 1;
    }
    if (args.verbose) {
      io.stdout.write(`${id.toString()}: `);
    }
    io.stdout.write(line);
  }

  return 0;
}

if (require.main === module) {
  process.exitCode = main(process.argv);
}
