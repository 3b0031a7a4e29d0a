import { CancelledError, EXIT_CODES, exitCodeFor } from "../errors.js";
import { PreflightChecker } from "../preflight/preflight-checker.js";
import { NodeProcessLauncher } from "../process/node-launcher.js";
import { RunSession } from "../session/run-session.js";
import { SignalTrap } from "../shutdown/signal-trap.js";
import { formatBlockers, formatFailure } from "./diagnostics.js";
import type { CommandContext } from "./types.js";

export interface RunCommandOptions {
  readonly hotReload: boolean;
}

/**
 * `appdev run`: dependencies, then the app in the foreground until it exits
 * or the user interrupts. An interrupt once the app is up is the normal way
 * out and exits 0.
 */
export async function runCommand(ctx: CommandContext, options: RunCommandOptions): Promise<number> {
  const { config, logger } = ctx;
  const printError = ctx.printError ?? ((text: string) => process.stderr.write(`${text}\n`));

  const preflight = await new PreflightChecker({ config, logger, locator: ctx.locator }).check("run");
  if (preflight.status === "blocked") {
    printError(formatBlockers(preflight.blockers));
    return EXIT_CODES.environmentBlocker;
  }

  const session = new RunSession({
    config,
    logger,
    mode: "run",
    hotReload: options.hotReload,
    launcher: ctx.launcher ?? new NodeProcessLauncher(),
    probe: ctx.probe,
    watch: ctx.watch,
    echo: ctx.echo,
    sidecarReset: ctx.sidecarReset,
    isProcessAlive: ctx.isProcessAlive,
  });
  const trap = new SignalTrap({ controller: session.controller, logger, emitter: ctx.signals });
  trap.install();

  let appStarted = false;
  try {
    await session.open();
    await session.startDependencies();
    logger.info({ app: config.app.healthUrl, hotReload: options.hotReload }, "Dependencies ready, starting app");

    appStarted = true;
    const exit = await session.runApp();
    logger.info({ exitCode: exit.code }, "App stopped");
    return EXIT_CODES.success;
  } catch (err) {
    if (err instanceof CancelledError) {
      return appStarted ? EXIT_CODES.success : EXIT_CODES.cancelled;
    }
    printError(formatFailure(err));
    return exitCodeFor(err);
  } finally {
    await session.close();
    trap.dispose();
  }
}
