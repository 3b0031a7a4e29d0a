import { exitCodeFor, EXIT_CODES } from "../errors.js";
import { PreflightChecker } from "../preflight/preflight-checker.js";
import { NodeProcessLauncher } from "../process/node-launcher.js";
import { RunSession } from "../session/run-session.js";
import type { SessionMode } from "../session/types.js";
import { SignalTrap } from "../shutdown/signal-trap.js";
import { ProcessCommandRunner } from "../testing/command-runner.js";
import { formatTestReport, writeTestReport } from "../testing/report.js";
import { TestLoopController } from "../testing/test-loop.js";
import type { TestMode, TestRunOptions } from "../testing/types.js";
import { formatBlockers, formatFailure } from "./diagnostics.js";
import type { CommandContext } from "./types.js";

const SESSION_MODES: Readonly<Record<TestMode, SessionMode>> = {
  unit: "test-unit",
  e2e: "test-e2e",
  all: "test-all",
};

/** `appdev test`: runs the selected phases, writes the report and exits with its code. */
export async function testCommand(ctx: CommandContext, options: TestRunOptions): Promise<number> {
  const { config, logger } = ctx;
  const print = ctx.print ?? ((text: string) => process.stdout.write(`${text}\n`));
  const printError = ctx.printError ?? ((text: string) => process.stderr.write(`${text}\n`));
  const mode = SESSION_MODES[options.mode];

  const preflight = await new PreflightChecker({ config, logger, locator: ctx.locator }).check(mode);
  if (preflight.status === "blocked") {
    printError(formatBlockers(preflight.blockers));
    return EXIT_CODES.environmentBlocker;
  }

  const launcher = ctx.launcher ?? new NodeProcessLauncher();
  const session = new RunSession({
    config,
    logger,
    mode,
    hotReload: false,
    launcher,
    probe: ctx.probe,
    watch: ctx.watch,
    echo: ctx.echo,
    sidecarReset: ctx.sidecarReset,
    isProcessAlive: ctx.isProcessAlive,
  });
  const trap = new SignalTrap({ controller: session.controller, logger, emitter: ctx.signals });
  trap.install();

  try {
    await session.open();

    const loop = new TestLoopController({
      config,
      logger,
      runner: new ProcessCommandRunner({ config, logger, launcher, echo: ctx.echo }),
      stack: session,
    });
    const report = await loop.run(options, session.signal);
    const reportPath = await writeTestReport(config.stateDir, report);
    logger.info({ reportPath, exitCode: report.exitCode }, "Test report written");

    print(formatTestReport(report));
    return report.exitCode;
  } catch (err) {
    printError(formatFailure(err));
    return exitCodeFor(err);
  } finally {
    await session.close();
    trap.dispose();
  }
}
