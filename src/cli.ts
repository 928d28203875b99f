import path from 'node:path';
import readline from 'node:readline';
import { loadConfig, type AppConfig, type Env } from './config';
import { createStorageBackend, type StorageBackend } from './db/backends';
import { openDbClient } from './db/client';
import { initializeDatabase } from './db/init';
import { SCHEMA_SQL } from './db/schema';
import { TradexDbError, errorMessage } from './errors';
import { createAuditRepo, type AuditEntry } from './repositories/audit';
import { createUsersRepo, type Role } from './repositories/users';
import { BackupRestoreTool } from './services/backup-restore';
import { createLogger, type Logger } from './utils/logger';
import { validatePassword } from './utils/passwords';

export interface CliRunOptions {
  argv?: string[];
  env?: Env;
  stdin?: NodeJS.ReadableStream;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
}

export type CliStatusCode = 0 | 1 | 2;

interface CliContext {
  config: AppConfig;
  /** Recorded as the audit actor. */
  actor: string;
  backend: StorageBackend;
  log: Logger;
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
}

interface CliCommandDescriptor {
  name: string;
  usage: string;
  description: string;
  run: (context: CliContext, args: string[]) => Promise<void>;
}

/** Bad invocation: reported with the usage text and exit status 2. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const ROLES: readonly Role[] = ['Owner', 'Infra', 'User'];

function positionals(args: string[], min: number, max: number, usage: string): string[] {
  if (args.length < min || args.length > max || args.some((a) => a.startsWith('-'))) {
    throw new CliUsageError(`usage: tradex-db ${usage}`);
  }
  return args;
}

async function readFirstLine(input: NodeJS.ReadableStream): Promise<string> {
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  try {
    for await (const line of rl) return line;
    return '';
  } finally {
    rl.close();
  }
}

type CliAuditEvent = Pick<AuditEntry, 'action' | 'object' | 'after'>;

function auditEntry({ actor }: CliContext, event: CliAuditEvent): AuditEntry {
  return { actor, ip: '', userAgent: 'tradex-db', ...event };
}

// Opens `dbPath` (the live database unless a restore named another target) just to append one entry.
async function recordAudit(context: CliContext, dbPath: string, event: CliAuditEvent): Promise<void> {
  const { config, backend } = context;
  const client = openDbClient({ ...config, dbPath }, backend);
  try {
    client.sqlite.exec(SCHEMA_SQL);
    await createAuditRepo(client.db, { retentionDays: config.auditRetentionDays }).add(auditEntry(context, event));
  } finally {
    client.close();
  }
}

function isRole(value: string): value is Role {
  return ROLES.some((r) => r === value);
}

const COMMANDS: CliCommandDescriptor[] = [
  {
    name: 'backup',
    usage: 'backup <path/to/backup.db>',
    description: 'Write a consistent snapshot of the database',
    async run(context, args) {
      const { config, backend, log, stdout } = context;
      const [destination] = positionals(args, 1, 1, 'backup <path/to/backup.db>');
      const result = await new BackupRestoreTool(config, backend, log).backup(destination);
      await recordAudit(context, config.dbPath, { action: 'backup', object: `file:${result.destination}` });
      stdout.write(`Backup written to ${result.destination} (${result.bytes} bytes)\n`);
    },
  },
  {
    name: 'restore',
    usage: 'restore <path/to/backup.db> [target]',
    description: 'Replace the database (or target) with a backup; stop the server first',
    async run(context, args) {
      const { config, backend, log, stdout } = context;
      const [source, target] = positionals(args, 1, 2, 'restore <path/to/backup.db> [target]');
      const result = await new BackupRestoreTool(config, backend, log).restore(source, target);
      await recordAudit(context, result.target, { action: 'restore', object: `file:${path.resolve(source)}` });
      stdout.write(`Restored ${result.target} from ${source}\n`);
    },
  },
  {
    name: 'init',
    usage: 'init',
    description: 'Create the tables and, outside production, the demo users',
    async run({ config, backend, log, stdout }, args) {
      positionals(args, 0, 0, 'init');
      const client = openDbClient(config, backend);
      try {
        const { seeded } = await initializeDatabase(client, config, log);
        stdout.write(`Database ready at ${client.path}${seeded.length ? ` (seeded ${seeded.join(', ')})` : ''}\n`);
      } finally {
        client.close();
      }
    },
  },
  {
    name: 'add-user',
    usage: 'add-user <username> [--role Owner|Infra|User]',
    description: 'Add a user; the password is read from the first line of stdin',
    async run(context, args) {
      const { config, backend, log, stdin, stdout } = context;
      const usage = 'add-user <username> [--role Owner|Infra|User]';
      let role: Role = 'User';
      const rest: string[] = [];
      for (let i = 0; i < args.length; i++) {
        if (args[i] === '--role') {
          const value = args[++i] ?? '';
          if (!isRole(value)) throw new CliUsageError(`--role must be one of ${ROLES.join(', ')}`);
          role = value;
        } else {
          rest.push(args[i]);
        }
      }
      const [username] = positionals(rest, 1, 1, usage);

      const password = (await readFirstLine(stdin)).trim();
      if (!validatePassword(password)) {
        throw new CliUsageError('password must be at least 8 characters, not a common password, and mix letters with other characters');
      }

      const client = openDbClient(config, backend);
      try {
        await initializeDatabase(client, config, log);
        const created = await createUsersRepo(client.db).create({ username, password, role });
        if (!created) throw new Error(`user ${username} already exists`);
        await createAuditRepo(client.db, { retentionDays: config.auditRetentionDays }).add(
          auditEntry(context, { action: 'create', object: `user:${username}`, after: { username, role } }),
        );
        stdout.write(`User ${username} added\n`);
      } finally {
        client.close();
      }
    },
  },
];

export function usageText(): string {
  const width = Math.max(...COMMANDS.map((c) => c.usage.length));
  const lines = COMMANDS.map((c) => `  ${c.usage.padEnd(width)}  ${c.description}`);
  return [
    'Usage: tradex-db <command> [args]',
    '',
    'Commands:',
    ...lines,
    '',
    'Environment: TRADEX_DB_PATH, TRADEX_ENV, TRADEX_USE_SQLCIPHER, TRADEX_DB_KEY, TRADEX_LOG_LEVEL',
    '',
  ].join('\n');
}

/**
 * Runs one command and resolves with the process exit status instead of
 * exiting, so tests can drive it with their own streams and environment.
 */
export async function runCli(options: CliRunOptions = {}): Promise<CliStatusCode> {
  const argv = options.argv ?? process.argv.slice(2);
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const [name, ...args] = argv;

  if (name === 'help' || name === '--help' || name === '-h') {
    stdout.write(usageText());
    return 0;
  }

  try {
    const command = COMMANDS.find((c) => c.name === name);
    if (!command) {
      throw new CliUsageError(name ? `unknown command '${name}'` : 'missing command');
    }
    // Configuration errors surface here, before any database file is opened.
    const env = options.env ?? process.env;
    const config = loadConfig(env);
    const log = createLogger('tradex-db', {
      level: config.logLevel,
      write: (line) => stderr.write(`${line}\n`),
    });
    await command.run(
      {
        config,
        actor: env.USER || 'tradex-db',
        backend: createStorageBackend(config),
        log,
        stdin: options.stdin ?? process.stdin,
        stdout,
      },
      args,
    );
    return 0;
  } catch (err) {
    if (err instanceof CliUsageError) {
      stderr.write(`error: ${err.message}\n\n${usageText()}`);
      return 2;
    }
    stderr.write(`error: ${errorMessage(err)}\n`);
    return err instanceof TradexDbError ? err.exitCode : 1;
  }
}
