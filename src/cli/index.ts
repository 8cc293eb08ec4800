#!/usr/bin/env tsx

/**
 * CLI entry point for network-order
 * Handles command-line argument parsing
 */

import { Command } from "commander";
import { orderCommand } from "./commands/order";

const program = new Command();

program
  .name("network-order")
  .description(
    "Compute an InertialFlowCutter node ordering for a RoutingKit network",
  )
  .version("0.1.0")
  .argument("<inertial-flow-path>", "InertialFlowCutter checkout (with build/console)")
  .argument("<data-path>", "Directory holding the RoutingKit text vectors")
  .argument("<graph-name>", "File name of the ordering written under ordering/")
  .option("-a, --attributes <names...>", "Attribute files to convert, in order")
  .option("--interpreter <command>", "Command that runs the ordering script")
  .option("--no-check-exit", "Continue when a tool exits with a non-zero status")
  .option("--clean", "Remove intermediate binary files after a successful run")
  .option("--dry-run", "Print the commands without running them")
  .option("-v, --verbose", "Verbose output")
  .action(orderCommand);

await program.parseAsync();
