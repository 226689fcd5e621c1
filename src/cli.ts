#!/usr/bin/env node
import "dotenv/config";
import { realpathSync } from "node:fs";
import { writeFile } from "node:fs/promises";
import { pathToFileURL } from "node:url";
import { Command } from "commander";
import { loadConfig, type PilotConfig } from "./config/env.js";
import { auditEntries } from "./core/ledger.js";
import type { PilotEvent, TaskResult } from "./core/types.js";
import { listAdbDevices, type AdbDeviceEntry } from "./device/adb-device.js";
import { createRuntime, type PilotRuntime } from "./runtime.js";
import { errorMessage } from "./utils/errors.js";
import { consoleLogger, initRunLogger, silentLogger } from "./utils/logger.js";

type RunOptions = {
  device?: string;
  maxSteps?: string;
  rules?: boolean;
  vision: boolean;
  plan: boolean;
  audit?: string;
  log: boolean;
};

export type CliDeps = {
  loadConfig?: () => PilotConfig;
  createRuntime?: (config: PilotConfig) => PilotRuntime;
  listDevices?: (adbPath: string) => Promise<AdbDeviceEntry[]>;
  print?: (line: string) => void;
};

function parseMaxSteps(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`Invalid --max-steps value: ${raw}. Expected a positive integer.`);
  }
  return value;
}

function describeEvent(event: PilotEvent): string | null {
  switch (event.type) {
    case "step": {
      const { step } = event;
      const mark = step.success ? "✓" : "✗";
      const tag = step.recovery ? " (recovery)" : "";
      const error = step.error ? ` ${step.error}` : "";
      return `${mark} ${step.index}. [${step.action}] ${step.description}${tag}${error}`;
    }
    case "warning":
      return `⚠ ${event.message}`;
    case "backoff":
      return `… planner unavailable, retrying in ${event.delayMs}ms (${event.reason})`;
    case "task_plan":
      return `Plan: ${event.plan.summary}`;
    default:
      return null;
  }
}

function printResult(result: TaskResult, print: (line: string) => void) {
  const icon = result.success ? "✅" : "❌";
  print(`${icon} ${result.success ? "Completed" : "Failed"} after ${result.stepsExecuted} step(s)`);
  if (result.completionReason) print(`   ${result.completionReason}`);
  if (result.error) print(`   ${result.error}`);
}

export function createProgram(deps: CliDeps = {}): Command {
  const print = deps.print ?? ((line: string) => console.log(line));
  const readConfig = deps.loadConfig ?? (() => loadConfig());
  const buildRuntime = deps.createRuntime ?? ((config: PilotConfig) => createRuntime(config));
  const listDevices = deps.listDevices ?? ((adbPath: string) => listAdbDevices(undefined, adbPath));

  const program = new Command();
  program.name("mobipilot").description("Carry out natural-language instructions on an Android device").version("0.1.0");

  program
    .command("run")
    .description("Run one instruction to completion")
    .argument("<instruction...>", "what to do on the device")
    .option("-d, --device <serial>", "adb serial of the target device")
    .option("-m, --max-steps <n>", "step budget for this run")
    .option("--rules", "use the rule-based planner instead of the LLM")
    .option("--no-vision", "do not send screenshots to the planner")
    .option("--no-plan", "skip the up-front task plan")
    .option("--audit <file>", "write the step audit log as JSON")
    .option("--no-log", "do not write a run log file")
    .action(async (words: string[], options: RunOptions) => {
      const instruction = words.join(" ").trim();
      const base = readConfig();
      const config: PilotConfig = {
        ...base,
        adbSerial: options.device ?? base.adbSerial,
        planner: options.rules ? "rules" : base.planner,
      };
      const maxSteps = parseMaxSteps(options.maxSteps) ?? config.maxSteps;

      const runtime = buildRuntime(config);
      const fileLogger = options.log ? initRunLogger({ logDir: config.logDir, mirror: silentLogger }) : null;
      const orchestrator = runtime.createOrchestrator({
        visionEnabled: options.vision && config.visionEnabled,
        planFirst: options.plan && config.planFirst,
        logger: fileLogger ?? runtime.logger,
      });

      try {
        await runtime.device.connect();
        print(`▶ ${instruction}`);
        const result = await orchestrator.runTask(instruction, {
          maxSteps,
          onEvent: (event) => {
            const line = describeEvent(event);
            if (line) print(line);
          },
        });
        printResult(result, print);
        if (options.audit) {
          await writeFile(options.audit, JSON.stringify(auditEntries(result.steps), null, 2), "utf-8");
          print(`Audit log written to ${options.audit}`);
        }
        process.exitCode = result.success ? 0 : 1;
      } finally {
        fileLogger?.close();
        await runtime.device.disconnect();
      }
    });

  program
    .command("devices")
    .description("List devices visible to adb")
    .action(async () => {
      const config = readConfig();
      const devices = await listDevices(config.adbPath);
      if (devices.length === 0) {
        print("No devices attached");
        return;
      }
      for (const device of devices) {
        print(`${device.serial}\t${device.state}${device.description ? `\t${device.description}` : ""}`);
      }
    });

  program
    .command("elements")
    .description("Print the indexed element list of the current screen")
    .option("-d, --device <serial>", "adb serial of the target device")
    .action(async (options: { device?: string }) => {
      const base = readConfig();
      const runtime = buildRuntime({ ...base, adbSerial: options.device ?? base.adbSerial });
      await runtime.device.connect();
      try {
        const snapshot = await runtime.createOrchestrator({ planner: "rules" }).captureSnapshot(false);
        if (snapshot.isEmpty()) {
          print("(no elements)");
          return;
        }
        for (const entry of snapshot.indexed) {
          const star = entry.element.clickable ? "★" : " ";
          print(`[${entry.index}]${star} ${entry.displayName}`);
        }
      } finally {
        await runtime.device.disconnect();
      }
    });

  return program;
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  createProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      consoleLogger.error(errorMessage(error));
      process.exitCode = 1;
    });
}
