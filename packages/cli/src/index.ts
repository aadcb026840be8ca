#!/usr/bin/env node
/**
 * agentpack CLI - lint and install an agent pack
 *
 * Validates markdown agents, commands, and the OpenCode config, then links
 * them into OpenCode and Claude Code.
 */

import { Command } from "commander";
import { lintCommand } from "./commands/lint.js";
import { listCommand } from "./commands/list.js";
import { newCommand } from "./commands/new.js";
import { installCommand } from "./commands/install.js";
import { uninstallCommand } from "./commands/uninstall.js";
import { statusCommand } from "./commands/status.js";
import { doctorCommand } from "./commands/doctor.js";
import { reportCommand } from "./commands/report.js";
import { setDebugMode } from "./core/global-tracer.js";

const program = new Command();

program
  .name("agentpack")
  .description("Lint and install a pack of AI agents, commands, and MCP servers")
  .version("0.1.0")
  .option("--debug", "Record debug entries in the trace log")
  .hook("preAction", (thisCommand) => {
    const { debug } = thisCommand.opts<{ debug?: boolean }>();
    if (debug) setDebugMode(true);
  });

// Register commands
program.addCommand(lintCommand);
program.addCommand(listCommand);
program.addCommand(newCommand);
program.addCommand(installCommand);
program.addCommand(uninstallCommand);
program.addCommand(statusCommand);
program.addCommand(doctorCommand);
program.addCommand(reportCommand);

await program.parseAsync();
