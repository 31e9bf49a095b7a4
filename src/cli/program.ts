import { Command, Option } from 'commander';
import { loadConfig, type AppConfig } from '../config/index.js';
import { configureLogger, getLogger } from '../utils/logging.js';
import { closeDatabase, getDatabase, resolveDatabasePath } from '../db/client.js';
import { IncidentRepository } from '../repositories/incidentRepository.js';
import { FileFeedSource, HttpFeedSource, type FeedSource } from '../services/feedSource.js';
import {
  FileMailTransport,
  SmtpMailTransport,
  type MailTransport,
} from '../services/mailTransport.js';
import { Notifier } from '../services/notifier.js';
import { RunOrchestrator } from '../services/runOrchestrator.js';
import { writeMetricsTextfile } from '../metrics/index.js';
import { DeliveryFailedError, type FailureKind } from '../core/errors.js';

/** Exit status for a run that ended in `Failed(kind)`. */
export function exitCodeFor(kind: FailureKind): number {
  switch (kind) {
    case 'MalformedTimestamp':
    case 'AmbiguousLocalTime':
    case 'EmptyDescription':
    case 'FeedUnavailable':
      return 2;
    case 'StoreUnavailable':
    case 'ConstraintViolation':
      return 3;
    case 'DeliveryFailed':
      return 4;
  }
}

function smtpTransport(cfg: AppConfig): SmtpMailTransport | null {
  if (!cfg.mail.relay) return null;
  return new SmtpMailTransport({
    relay: cfg.mail.relay,
    port: cfg.mail.port,
    secure: cfg.mail.secure,
    username: cfg.mail.username,
    password: cfg.mail.password,
    timeoutMs: cfg.mail.timeoutMs,
  });
}

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace'] as const;

interface GlobalOptions {
  config: string;
  logLevel?: AppConfig['logging']['level'];
}

/** Loads the config named by `--config` and sets up logging from it. */
function loadCliConfig(cmd: Command): AppConfig {
  const globals = cmd.optsWithGlobals<GlobalOptions>();
  const cfg = loadConfig(globals.config);
  if (globals.logLevel) {
    cfg.logging.level = globals.logLevel;
  }
  configureLogger(cfg.logging);
  return cfg;
}

function usageError(message: string): void {
  console.error(message);
  process.exitCode = 1;
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('transit-alert')
    .description('Notify by email about transit incidents not reported before')
    .version('0.1.0')
    .option('-c, --config <path>', 'JSON config file', 'transit-alert.config.json')
    .addOption(
      new Option('--log-level <level>', 'Log verbosity (overrides logging.level)').choices(
        LOG_LEVELS,
      ),
    );

  program
    .command('init')
    .description('Create the incident store if missing (empty watermark)')
    .action((_opts: Record<string, never>, cmd: Command) => {
      const cfg = loadCliConfig(cmd);
      try {
        getDatabase(cfg.database.url);
        console.log(`Initialized incident store at ${resolveDatabasePath(cfg.database.url)}`);
      } finally {
        closeDatabase();
      }
    });

  program
    .command('run')
    .description('Run one reconciliation pass: fetch, notify new incidents, commit them')
    .option('-i, --input <file>', 'Read the feed from a JSON file ("-" for stdin)')
    .option('-u, --url <url>', 'Fetch the feed from this URL (overrides feed.url)')
    .option('-t, --to <address>', 'Recipient address (overrides mail.to)')
    .option('--metrics-file <path>', 'Write Prometheus metrics to this file after the run')
    .action(
      async (
        opts: { input?: string; url?: string; to?: string; metricsFile?: string },
        cmd: Command,
      ) => {
        const cfg = loadCliConfig(cmd);
        const log = getLogger();

        const feedUrl = opts.url ?? cfg.feed.url;
        let feed: FeedSource;
        if (opts.input) {
          feed = new FileFeedSource(opts.input);
        } else if (feedUrl) {
          feed = new HttpFeedSource(feedUrl);
        } else {
          return usageError('No feed given: pass --input or --url, or set feed.url');
        }

        const to = opts.to ?? cfg.mail.to;
        const from = cfg.mail.from;
        if (!to) return usageError('No recipient: pass --to or set mail.to / MAIL_TO');
        if (!from) return usageError('No sender: set mail.from / MAIL_FROM');

        let transport: MailTransport;
        if (cfg.mail.transport === 'file') {
          transport = new FileMailTransport(cfg.mail.outboxDir);
        } else {
          const smtp = smtpTransport(cfg);
          if (!smtp) return usageError('No SMTP relay: set mail.relay / SMTP_RELAY');
          transport = smtp;
        }

        const orchestrator = new RunOrchestrator({
          feed,
          store: new IncidentRepository(cfg.database.url),
          notifier: new Notifier({ transport, from, to, subjectPrefix: cfg.mail.subjectPrefix }),
          normalize: {
            timezone: cfg.feed.timezone,
            timestampFormat: cfg.feed.timestampFormat,
            invalidRecords: cfg.feed.invalidRecords,
          },
        });

        try {
          const outcome = await orchestrator.run();
          if (outcome.status === 'Done') {
            console.log(
              JSON.stringify(
                {
                  status: outcome.status,
                  runId: outcome.runId,
                  fetched: outcome.fetched,
                  skipped: outcome.skipped,
                  notified: outcome.batch.length,
                },
                null,
                2,
              ),
            );
          } else {
            console.error(`Failed(${outcome.error.kind}): ${outcome.error.message}`);
            process.exitCode = exitCodeFor(outcome.error.kind);
          }
        } finally {
          closeDatabase();
          const metricsFile = opts.metricsFile ?? cfg.metrics.textfilePath;
          if (metricsFile) {
            await writeMetricsTextfile(metricsFile);
            log.debug({ file: metricsFile }, 'metrics written');
          }
        }
      },
    );

  program
    .command('list')
    .description('List incidents already notified about, newest first')
    .option('-l, --limit <n>', 'Maximum number of incidents', '50')
    .action(async (opts: { limit: string }, cmd: Command) => {
      const cfg = loadCliConfig(cmd);
      const limit = parseInt(opts.limit, 10);
      if (Number.isNaN(limit) || limit <= 0) {
        return usageError('--limit must be a positive integer');
      }
      try {
        const incidents = await new IncidentRepository(cfg.database.url).list(limit);
        console.log(JSON.stringify(incidents, null, 2));
      } finally {
        closeDatabase();
      }
    });

  program
    .command('verify-transport')
    .description('Check that the SMTP relay accepts a connection and the credentials')
    .action(async (_opts: Record<string, never>, cmd: Command) => {
      const cfg = loadCliConfig(cmd);
      const smtp = smtpTransport(cfg);
      if (!smtp) return usageError('No SMTP relay: set mail.relay / SMTP_RELAY');
      try {
        await smtp.verify();
        console.log(`Relay ${cfg.mail.relay} accepted connection and credentials`);
      } catch (err) {
        if (!(err instanceof DeliveryFailedError)) throw err;
        const cause = err.cause instanceof Error ? `: ${err.cause.message}` : '';
        console.error(`${err.message}${cause}`);
        process.exitCode = 1;
      }
    });

  return program;
}
