import chalk from "chalk";
import { appendFileSync } from "node:fs";

// log sinks for the cli. the codec modules never print; the fragment assembler traces through dim().

type LogLevel = "SUCCESS" | "ERROR" | "WARNING" | "INFO" | "DEBUG";

let logFilePath: string | null = null;
let verbose = false;

function isTestEnv(): boolean {
  return process.env.NODE_ENV === "test" || process.env.JEST_WORKER_ID !== undefined;
}

function printExceptInTestEnv(message: string, stream: "stdout" | "stderr" = "stdout"): void {
  if (isTestEnv()) {
    return;
  }
  if (stream === "stderr") {
    console.error(message);
  } else {
    console.log(message);
  }
}

export function setLogFile(filePath: string | null): void {
  logFilePath = filePath;
}

// debug traces (dim) are only echoed to the terminal when verbose; the log file always gets them.
export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

function writeToLog(level: LogLevel, message: string): void {
  if (!logFilePath) {
    return;
  }

  const timestamp = new Date().toISOString();
  appendFileSync(logFilePath, `[${timestamp}] [${level}] ${message}\n`, "utf-8");
}

export function success(message: string): void {
  printExceptInTestEnv(chalk.green(message));
  writeToLog("SUCCESS", message);
}

export function error(message: string): void {
  printExceptInTestEnv(chalk.red(message), "stderr");
  writeToLog("ERROR", message);
}

export function warning(message: string): void {
  printExceptInTestEnv(chalk.bgHex(`#FFA500`).black(`WARNING: ${message}`), "stderr");
  writeToLog("WARNING", message);
}

export function info(message: string): void {
  printExceptInTestEnv(chalk.blue(message));
  writeToLog("INFO", message);
}

export function dim(message: string): void {
  if (verbose) {
    printExceptInTestEnv(chalk.gray(message));
  }
  writeToLog("DEBUG", message);
}

export function h1(message: string): void {
  printExceptInTestEnv(chalk.cyanBright(message));
  writeToLog("INFO", message);
}
