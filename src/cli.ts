#!/usr/bin/env node
import fs from 'fs/promises';
import path from 'path';
import { Command, CommanderError, Option } from 'commander';
import { z } from 'zod';
import { loadAppConfig } from './config/app.config';
import { loadClusterDefinitions } from './config/clusters';
import { closeDatabase, connectDatabase } from './config/database';
import { buildServices, Services } from './container';
import { asBatch } from './middlewares/validation.middleware';
import { MongoPersistence } from './repositories/MongoPersistence';
import { jobSpecSchema, parseBatch } from './schemas';
import { requireAuthorization } from './services/AuthService';
import { scheduleJobs } from './services/ScheduleService';
import { BatchResult, JOB_STATUSES } from './types';
import { errorMessage } from './types/errors';
import { succeeded } from './utils/batch';
import { closeLogger, logger } from './utils/logger';

export interface CliDeps {
  services: Services;
  ensureIndexes(): Promise<void>;
  bootstrapAdmin?: { email: string; password: string };
  /** Used when `--token` is not given. */
  defaultToken?: string;
}

export interface CliOutput {
  out(text: string): void;
  err(text: string): void;
}

const jobStatusSchema = z.enum(JOB_STATUSES).optional();

/**
 * Operator console over the same services as the API. Results are printed
 * as JSON; a batch with any failed item makes the command exit with 1.
 */
export function createCli(deps: CliDeps, io: CliOutput): { program: Command; failed: () => boolean } {
  const { services } = deps;
  let anyFailed = false;

  const program = new Command('conductor')
    .description('Conductor console')
    .option('-t, --token <token>', 'session token (defaults to $CONDUCTOR_TOKEN)')
    .configureOutput({
      writeOut: (text) => io.out(text.trimEnd()),
      writeErr: (text) => io.err(text.trimEnd()),
    })
    .exitOverride();

  const token = (): string | undefined => program.opts<{ token?: string }>().token ?? deps.defaultToken;
  const print = (value: unknown): void => io.out(JSON.stringify(value, null, 2));
  const report = <T>(results: BatchResult<T>[]): void => {
    if (results.some((result) => !result.ok)) anyFailed = true;
    print(results);
  };

  program
    .command('login')
    .description('Exchange credentials for a session token')
    .argument('<email>')
    .requiredOption('-p, --password <password>')
    .action(async (email: string, opts: { password: string }) => {
      const session = await services.auth.authenticate({ email, password: opts.password });
      print(session);
    });

  program
    .command('create')
    .description('Submit the job spec(s) in a JSON file')
    .argument('<file>', 'a spec object or an array of specs')
    .action(async (file: string) => {
      const content = await fs.readFile(path.resolve(file), 'utf8');
      const specs = parseBatch(jobSpecSchema, asBatch(JSON.parse(content)), 'job');
      report(await services.jobs.submit(specs, token()));
    });

  program
    .command('cancel')
    .description('Request cancellation of jobs')
    .argument('<jobIds...>')
    .action(async (jobIds: string[]) => {
      report(await services.jobs.cancel(jobIds, token()));
    });

  const get = program.command('get').description('Read jobs, schedules and clusters');

  get
    .command('job')
    .argument('<jobId>')
    .action(async (jobId: string) => {
      await requireAuthorization(services.auth, token(), 'job:read');
      print(await services.jobs.get(jobId));
    });

  get
    .command('jobs')
    .option('--owner <userId>')
    .addOption(new Option('--status <status>').choices(JOB_STATUSES))
    .action(async (opts: { owner?: string; status?: string }) => {
      await requireAuthorization(services.auth, token(), 'job:read');
      print(await services.jobs.list({ owner: opts.owner, status: jobStatusSchema.parse(opts.status) }));
    });

  get
    .command('schedules')
    .argument('<queryType>', 'schedule_id, job_id or cluster_id')
    .argument('<value>')
    .option('-a, --all', 'include withdrawn schedules')
    .action(async (queryType: string, value: string, opts: { all?: boolean }) => {
      await requireAuthorization(services.auth, token(), 'schedule:read');
      print(await services.schedules.get({ queryType, value, includeInactive: opts.all }));
    });

  get
    .command('clusters')
    .action(async () => {
      await requireAuthorization(services.auth, token(), 'cluster:read');
      print(await services.clusters.listClusters());
    });

  const sched = program.command('sched').description('Place, submit and withdraw schedules');

  sched
    .command('add')
    .description('Let the scheduler place jobs on clusters')
    .argument('<jobIds...>')
    .option('-d, --dispatch', 'submit the new schedules right away')
    .action(async (jobIds: string[], opts: { dispatch?: boolean }) => {
      const schedules = await scheduleJobs(services.scheduler, services.schedules, jobIds, token());
      report(schedules);
      if (!opts.dispatch) return;

      const ids = succeeded(schedules).map((schedule) => schedule.scheduleId);
      if (ids.length > 0) report(await services.dispatcher.dispatch(ids, token()));
    });

  sched
    .command('dispatch')
    .description('Submit scheduled jobs to their clusters')
    .argument('<scheduleIds...>')
    .action(async (scheduleIds: string[]) => {
      report(await services.dispatcher.dispatch(scheduleIds, token()));
    });

  sched
    .command('rm')
    .description('Withdraw schedules')
    .argument('<scheduleIds...>')
    .action(async (scheduleIds: string[]) => {
      report(await services.schedules.delete(scheduleIds.map((scheduleId) => ({ scheduleId })), token()));
    });

  program
    .command('reconcile')
    .description('Poll every dispatched schedule once')
    .action(async () => {
      await requireAuthorization(services.auth, token(), 'schedule:update');
      print(await services.reconciliation.reconcileOnce());
    });

  const db = program.command('db').description('Database maintenance');

  db.command('init')
    .description('Build indexes and create the first admin')
    .action(async () => {
      await deps.ensureIndexes();
      const admin = deps.bootstrapAdmin
        ? await services.auth.bootstrapAdmin(deps.bootstrapAdmin.email, deps.bootstrapAdmin.password)
        : null;
      print({ indexes: 'in sync', admin: admin ? admin.email : null });
    });

  return { program, failed: () => anyFailed };
}

/** Parses `argv` (without the node and script entries) and returns the exit code. */
export async function runCli(argv: readonly string[], deps: CliDeps, io: CliOutput): Promise<number> {
  const { program, failed } = createCli(deps, io);
  try {
    await program.parseAsync([...argv], { from: 'user' });
    return failed() ? 1 : 0;
  } catch (error) {
    if (error instanceof CommanderError) return error.exitCode;
    io.err(`❌ ${errorMessage(error)}`);
    return 1;
  }
}

async function main(): Promise<void> {
  const config = loadAppConfig();
  await connectDatabase(config.database);

  try {
    const persistence = new MongoPersistence();
    const definitions = await loadClusterDefinitions(config.clustersFile);
    const services = buildServices(config, persistence, definitions);

    process.exitCode = await runCli(
      process.argv.slice(2),
      {
        services,
        ensureIndexes: () => persistence.ensureIndexes(),
        bootstrapAdmin: config.bootstrapAdmin,
        defaultToken: process.env.CONDUCTOR_TOKEN,
      },
      {
        out: (text) => process.stdout.write(`${text}\n`),
        err: (text) => process.stderr.write(`${text}\n`),
      },
    );
  } finally {
    await closeDatabase();
  }
}

if (require.main === module) {
  main()
    .catch((error: unknown) => {
      logger.error('❌ Conductor CLI failed:', error);
      process.exitCode = 1;
    })
    .finally(() => closeLogger());
}
