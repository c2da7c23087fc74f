#!/usr/bin/env -S node --import tsx
import * as fs from 'node:fs';
import * as path from 'node:path';
import { pathToFileURL } from 'node:url';
import {
  ChainError,
  ChainQuery,
  ChainStore,
  ChainVerifier,
  ConfigError,
  DEFAULT_CONFIG_FILE,
  PublicAuditInterface,
  loadChainConfig,
  parseExport,
  verifyEntries,
} from '../audit/index.ts';
import type { ChainConfig, ChainExportHeader, VerificationResult } from '../audit/index.ts';

export type CommandSpec =
  | { command: 'verify' }
  | { command: 'stats' }
  | { command: 'export'; outPath: string; redact: boolean }
  | { command: 'verify-file'; filePath: string }
  | { command: 'help' };

export interface GlobalArgs {
  dbPath?: string;
  configPath?: string;
  args: string[];
}

export interface CliIo {
  out: (line: string) => void;
  err: (line: string) => void;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

const HELP = `Audit chain verification tool

Usage:
  audit-chain [--db <path>] [--config <path>] [verify]
  audit-chain [--db <path>] [--config <path>] stats
  audit-chain [--db <path>] [--config <path>] export <out.json> [--public]
  audit-chain [--config <path>] verify-file <export.json>

Commands:
  verify        Re-verify every entry of the chain store (default)
  stats         Print public statistics as JSON
  export        Write a chain export; --public redacts sensitive entries
  verify-file   Verify an export document produced by "export"

Options:
  --db <path>       Chain store file (default: storage_path from config)
  --config <path>   Config file (default: ./${DEFAULT_CONFIG_FILE} when present)
`;

function takeValue(argv: string[], i: number, flag: string): string {
  const value = argv[i + 1];
  if (!value || value.startsWith('-')) {
    throw new UsageError(`${flag} requires a path value`);
  }
  return value;
}

export function parseGlobalArgs(argv: string[]): GlobalArgs {
  const parsed: GlobalArgs = { args: [] };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (typeof arg !== 'string') continue;
    if (arg === '--db') {
      parsed.dbPath = takeValue(argv, i, '--db');
      i += 1;
      continue;
    }
    if (arg === '--config') {
      parsed.configPath = takeValue(argv, i, '--config');
      i += 1;
      continue;
    }
    parsed.args.push(arg);
  }
  return parsed;
}

export function parseCommand(args: string[]): CommandSpec {
  const command = args[0];
  switch (command) {
    case undefined:
    case 'verify':
      if (args.length > 1) throw new UsageError(`Unexpected argument: ${args[1]}`);
      return { command: 'verify' };
    case 'stats':
      if (args.length > 1) throw new UsageError(`Unexpected argument: ${args[1]}`);
      return { command: 'stats' };
    case 'export': {
      const rest = args.slice(1);
      const redact = rest.includes('--public');
      const positional = rest.filter(arg => arg !== '--public');
      const unknownFlag = positional.find(arg => arg.startsWith('-'));
      if (unknownFlag) throw new UsageError(`Unknown export flag: ${unknownFlag}`);
      const outPath = positional[0];
      if (!outPath || positional.length > 1) throw new UsageError('export requires exactly one <out.json>');
      return { command: 'export', outPath, redact };
    }
    case 'verify-file': {
      const filePath = args[1];
      if (!filePath || args.length > 2) throw new UsageError('verify-file requires exactly one <export.json>');
      return { command: 'verify-file', filePath };
    }
    case '--help':
    case '-h':
    case 'help':
      return { command: 'help' };
    default:
      throw new UsageError(`Unknown command: ${command}`);
  }
}

export function resolveConfig(configPath: string | undefined, cwd: string): ChainConfig {
  if (configPath) return loadChainConfig(path.resolve(cwd, configPath), true);
  return loadChainConfig(path.join(cwd, DEFAULT_CONFIG_FILE));
}

export function describeResult(result: VerificationResult): string {
  if (result.firstFailure) {
    const { sequence, reason, message } = result.firstFailure;
    return `chain broken at sequence ${sequence}: ${reason} (${message})`;
  }
  const redacted = result.redacted ? ` (${result.redacted} redacted)` : '';
  return `chain intact, ${result.checked} entries verified${redacted}`;
}

function report(result: VerificationResult, io: CliIo): number {
  if (result.valid) {
    io.out(describeResult(result));
    return 0;
  }
  io.err(describeResult(result));
  return 1;
}

function runAgainstStore(cmd: CommandSpec, globals: GlobalArgs, io: CliIo, cwd: string): number {
  const config = resolveConfig(globals.configPath, cwd);
  const dbPath = path.resolve(cwd, globals.dbPath ?? config.storage_path);
  const store = new ChainStore(dbPath, config, { readonly: true });

  try {
    const verifier = new ChainVerifier(store, config, { warn: io.err });
    switch (cmd.command) {
      case 'verify':
        return report(verifier.verify(), io);
      case 'stats': {
        const facade = new PublicAuditInterface(store, verifier, new ChainQuery(store));
        io.out(JSON.stringify(facade.getStatistics(), null, 2));
        return 0;
      }
      case 'export': {
        const facade = new PublicAuditInterface(store, verifier, new ChainQuery(store));
        const document = cmd.redact ? facade.exportPublicLog() : facade.exportFullLog();
        const outPath = path.resolve(cwd, cmd.outPath);
        fs.writeFileSync(outPath, `${JSON.stringify(document, null, 2)}\n`);
        io.out(`exported ${document.entries.length} entries to ${outPath}`);
        return 0;
      }
      default:
        throw new UsageError(`Command ${cmd.command} does not read a chain store`);
    }
  } finally {
    store.close();
  }
}

// An explicit config pins what the export must have been hashed with.
function assertExportMatches(header: ChainExportHeader, config: ChainConfig): void {
  if (header.hash_algorithm !== config.hash_algorithm) {
    throw new ConfigError(`export uses ${header.hash_algorithm}, config says ${config.hash_algorithm}`);
  }
  if (header.genesis_sentinel !== config.genesis_sentinel) {
    throw new ConfigError('export was created with a different genesis_sentinel');
  }
}

function runVerifyFile(filePath: string, configPath: string | undefined, io: CliIo, cwd: string): number {
  const config = configPath === undefined ? undefined : resolveConfig(configPath, cwd);
  const resolved = path.resolve(cwd, filePath);
  if (!fs.existsSync(resolved)) {
    io.err(`export file not found: ${resolved}`);
    return 1;
  }
  const parsed = parseExport(fs.readFileSync(resolved, 'utf8'));
  if (config) assertExportMatches(parsed.header, config);
  return report(verifyEntries(parsed.entries, parsed.header, { warn: io.err }), io);
}

const consoleIo: CliIo = {
  out: line => console.log(line),
  err: line => console.error(line),
};

/**
 * Runs one command and returns the process exit code: 0 when the chain is
 * intact, 1 for a broken chain or an operational failure, 2 for bad usage.
 */
export function runCli(argv: string[] = process.argv.slice(2), io: CliIo = consoleIo, cwd = process.cwd()): number {
  let globals: GlobalArgs;
  let cmd: CommandSpec;
  try {
    globals = parseGlobalArgs(argv);
    cmd = parseCommand(globals.args);
    if (cmd.command === 'verify-file' && globals.dbPath !== undefined) {
      throw new UsageError('--db does not apply to verify-file');
    }
  } catch (err) {
    if (!(err instanceof UsageError)) throw err;
    io.err(err.message);
    io.err('Run with --help for usage.');
    return 2;
  }

  try {
    switch (cmd.command) {
      case 'help':
        io.out(HELP);
        return 0;
      case 'verify-file':
        return runVerifyFile(cmd.filePath, globals.configPath, io, cwd);
      default:
        return runAgainstStore(cmd, globals, io, cwd);
    }
  } catch (err) {
    if (err instanceof ChainError) {
      io.err(`${err.code}: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

function isDirectRun(): boolean {
  const argv1 = process.argv[1];
  if (!argv1) return false;
  return import.meta.url === pathToFileURL(argv1).href;
}

if (isDirectRun()) {
  try {
    process.exit(runCli());
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(message);
    process.exit(1);
  }
}
