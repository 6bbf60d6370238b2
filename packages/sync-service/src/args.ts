import type { OutputFormat } from './report.js';

export type CliOptions = {
  configPath: string;
  dryRun: boolean;
  groups: string[];
  output: OutputFormat;
  serve: boolean;
};

export type CliParseResult =
  | { ok: true; options: CliOptions }
  | { ok: false; help: boolean; message?: string };

export const USAGE = [
  'Usage: groupsync --config <config.json> [options]',
  '',
  'Options:',
  '  --config <path>     Configuration file (required)',
  '  --dry-run           Compute and report plans without changing memberships',
  '  --group <name>      Only sync this directory group (repeatable)',
  '  --output <format>   Report format: text (default) or json',
  '  --serve             Run the HTTP trigger instead of a single pass',
  '  --help              Show this help',
].join('\n');

export function parseCliArgs(args: readonly string[]): CliParseResult {
  let configPath: string | null = null;
  let dryRun = false;
  let serve = false;
  let output: OutputFormat = 'text';
  const groups: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--help':
      case '-h':
        return { ok: false, help: true };
      case '--dry-run':
        dryRun = true;
        break;
      case '--serve':
        serve = true;
        break;
      case '--config':
      case '--group':
      case '--output': {
        const value = args[i + 1];
        if (value === undefined || value.startsWith('--')) {
          return { ok: false, help: false, message: `Missing value for ${arg}` };
        }
        i++;
        if (arg === '--config') configPath = value;
        else if (arg === '--group') groups.push(value);
        else if (value === 'text' || value === 'json') output = value;
        else return { ok: false, help: false, message: `Unknown output format: ${value}` };
        break;
      }
      default:
        return { ok: false, help: false, message: `Unknown argument: ${String(arg)}` };
    }
  }

  if (!configPath) {
    return { ok: false, help: false, message: 'Missing required --config' };
  }

  return { ok: true, options: { configPath, dryRun, groups, output, serve } };
}
