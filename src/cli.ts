import { Command, InvalidArgumentError } from "commander";
import type { Command as PomobarCommand } from "./types/command.js";
import type { ConfigOverrides } from "./types/config.js";
import { parseAdjustment } from "./commands/send.js";

/** Options accepted before any subcommand */
export interface GlobalOptions {
  config?: string;
  socket?: string;
}

/**
 * What each subcommand does once its arguments are parsed.
 */
export interface CliHandlers {
  display(globals: GlobalOptions, overrides: ConfigOverrides): Promise<void>;
  send(globals: GlobalOptions, command: PomobarCommand): Promise<void>;
  doctor(globals: GlobalOptions): Promise<void>;
}

function parsePositiveMinutes(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive number of minutes.");
  }
  return parsed;
}

function parseInterval(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value) || parsed < 50 || parsed > 5000) {
    throw new InvalidArgumentError("Expected an integer between 50 and 5000.");
  }
  return parsed;
}

export function createProgram(handlers: CliHandlers): Command {
  const program = new Command();
  const globalOptions = (): GlobalOptions => program.opts<GlobalOptions>();

  program
    .name("pomobar")
    .description("Pomodoro timer for status bars, controlled from click and scroll handlers")
    .version("1.0.0")
    .option("-c, --config <path>", "Path to configuration file")
    .option("-s, --socket <path>", "Path of the display endpoint socket");

  program
    .command("display")
    .description("Run the timer display (writes one status line per cycle to stdout)")
    .option("-w, --work <minutes>", "Work phase length in minutes", parsePositiveMinutes)
    .option("-b, --break <minutes>", "Break phase length in minutes", parsePositiveMinutes)
    .option("--json", "Write JSON status lines for bars with JSON custom modules")
    .option("--interval <ms>", "Longest wait for a command per cycle", parseInterval)
    .action(async (options: { work?: number; break?: number; json?: boolean; interval?: number }) => {
      await handlers.display(globalOptions(), {
        work_minutes: options.work,
        break_minutes: options.break,
        poll_interval_ms: options.interval,
        output: options.json ? "json" : undefined,
      });
    });

  program
    .command("toggle")
    .description("Start or pause the timer")
    .action(async () => {
      await handlers.send(globalOptions(), { type: "toggle" });
    });

  program
    .command("end")
    .description("End the current phase and switch between work and break")
    .action(async () => {
      await handlers.send(globalOptions(), { type: "complete" });
    });

  program
    .command("lock")
    .description("Lock or unlock time adjustments")
    .action(async () => {
      await handlers.send(globalOptions(), { type: "toggle-lock" });
    });

  program
    .command("time")
    .description("Adjust the remaining time, e.g. `time +60` or `time -60` (seconds)")
    .argument("<amount>", "Seconds to add (+N or N) or subtract (-N)", parseAdjustment)
    // "-60" would otherwise be rejected as an unknown option
    .allowUnknownOption()
    .action(async (command: PomobarCommand) => {
      await handlers.send(globalOptions(), command);
    });

  program
    .command("doctor")
    .description("Diagnose pomobar configuration and environment")
    .action(async () => {
      await handlers.doctor(globalOptions());
    });

  return program;
}
