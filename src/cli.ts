import { Command, CommanderError } from "commander";
import { loadConfig, type AppConfig } from "./config.js";
import { diffScan } from "./lib/diff.js";
import { findingToJson, type Finding } from "./lib/finding.js";
import { ScanLocation } from "./lib/location.js";
import { createLogger, type Logger } from "./lib/logger.js";
import { createDefaultAnalyzers, Pipeline } from "./lib/pipeline.js";
import { applyConfigOverrides, loadSettingsFromFile, type Settings } from "./lib/settings.js";

type Runtime = { config: AppConfig; settings: Settings; logger: Logger };

/** Exit codes: 0 clean, 1 findings reported under HALO_FAIL_ON_FINDINGS, 2 usage error or failure. */
export const EXIT_OK = 0;
export const EXIT_FINDINGS = 1;
export const EXIT_USAGE = 2;

function loadRuntime(env: NodeJS.ProcessEnv): Runtime {
  const config = loadConfig(env);
  const logger = createLogger(config.LOG_LEVEL);
  const settings = applyConfigOverrides(loadSettingsFromFile(config.HALO_CONFIG_FILE), config);
  logger.debug(`halo version=${config.VERSION} settings=${config.HALO_CONFIG_FILE}`);
  return { config, settings, logger };
}

function emit(record: unknown): void {
  process.stdout.write(`${JSON.stringify(record)}\n`);
}

function report(finding: Finding, settings: Settings): boolean {
  if (finding.score < settings.min_score) return false;
  emit(findingToJson(finding));
  return true;
}

async function scan(paths: string[], rt: Runtime): Promise<number> {
  const pipeline = new Pipeline(createDefaultAnalyzers(), {
    settings: rt.settings,
    logger: rt.logger,
    tmpRoot: rt.config.HALO_TMP_DIR
  });
  let reported = 0;
  for (const target of paths) {
    for await (const finding of pipeline.run(await ScanLocation.create(target))) {
      if (report(finding, rt.settings)) reported += 1;
    }
  }
  rt.logger.info(`Scan finished paths=${paths.length} findings=${reported}`);
  return reported;
}

async function diff(aPath: string, bPath: string, rt: Runtime): Promise<number> {
  const a = await ScanLocation.create(aPath);
  let reported = 0;
  try {
    const b = await ScanLocation.create(bPath);
    try {
      const ctx = { settings: rt.settings, logger: rt.logger, tmpRoot: rt.config.HALO_TMP_DIR };
      for await (const item of diffScan(a, b, ctx)) {
        if (item.type === "finding") {
          if (report(item.finding, rt.settings)) reported += 1;
          continue;
        }
        const { operation, a_ref, b_ref, a_sha256, b_sha256 } = item.diff;
        emit({ operation, a_ref, b_ref, a_sha256, b_sha256 });
      }
    } finally {
      b.release();
    }
  } finally {
    a.release();
  }
  rt.logger.info(`Diff finished findings=${reported}`);
  return reported;
}

function createProgram(env: NodeJS.ProcessEnv, outcome: { reported: number; failOnFindings: boolean }): Command {
  const program = new Command();

  program
    .name("halo")
    .description("Static analysis of third-party packages: unsafe archive entries and weak cryptographic keys")
    .exitOverride();

  program
    .command("scan")
    .description("Scan files, directories and archives, printing findings as JSON lines")
    .argument("<paths...>", "paths to scan")
    .action(async (paths: string[]) => {
      const rt = loadRuntime(env);
      outcome.failOnFindings = rt.config.HALO_FAIL_ON_FINDINGS;
      outcome.reported = await scan(paths, rt);
    });

  program
    .command("diff")
    .description("Print the file differences between two locations and scan changed archives on both sides")
    .argument("<a>", "old side")
    .argument("<b>", "new side")
    .action(async (a: string, b: string) => {
      const rt = loadRuntime(env);
      outcome.failOnFindings = rt.config.HALO_FAIL_ON_FINDINGS;
      outcome.reported = await diff(a, b, rt);
    });

  return program;
}

/** Runs the command line (without the node and script arguments) and returns the exit code. */
export async function runCli(argv: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  const outcome = { reported: 0, failOnFindings: false };
  try {
    await createProgram(env, outcome).parseAsync(argv, { from: "user" });
  } catch (e) {
    if (e instanceof CommanderError) return e.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
    throw e;
  }
  return outcome.failOnFindings && outcome.reported > 0 ? EXIT_FINDINGS : EXIT_OK;
}
