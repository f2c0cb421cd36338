#!/usr/bin/env node

import { ConfigError, loadConfig } from "./lib/config.js";
import type { LoadedConfig } from "./lib/config.js";
import { BindError } from "./lib/endpoint.js";
import type { ConfigOverrides } from "./types/config.js";
import { sendCommandAndReport } from "./commands/send.js";
import { createProgram } from "./cli.js";
import type { CliHandlers, GlobalOptions } from "./cli.js";

async function loadConfigOrExit(globals: GlobalOptions, overrides: ConfigOverrides = {}): Promise<LoadedConfig> {
  try {
    return await loadConfig({ configPath: globals.config, overrides: { ...overrides, socket_path: globals.socket } });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

const handlers: CliHandlers = {
  async display(globals, overrides) {
    const { config } = await loadConfigOrExit(globals, overrides);
    try {
      const { displayCommand } = await import("./commands/display.js");
      await displayCommand(config);
    } catch (error) {
      if (error instanceof BindError) {
        console.error(error.message);
        process.exit(1);
      }
      console.error("Fatal error in display loop:", error);
      process.exit(1);
    }
  },

  async send(globals, command) {
    const { config } = await loadConfigOrExit(globals);
    const delivered = await sendCommandAndReport(config.socket_path, command);
    if (!delivered) {
      process.exit(1);
    }
  },

  async doctor(globals) {
    const { doctorCommand } = await import("./commands/doctor.js");
    const ok = await doctorCommand({ configPath: globals.config, socketPath: globals.socket });
    if (!ok) {
      process.exit(1);
    }
  },
};

export async function main(): Promise<void> {
  await createProgram(handlers).parseAsync(process.argv);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
