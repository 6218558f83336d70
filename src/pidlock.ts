import fs from "node:fs";
import path from "node:path";
import { log } from "./utils/logger.js";

const bootLog = log.withScope("boot");

/**
 * PID lock file so two servers never share one database.
 */

function errorCode(err: unknown): string | undefined {
  if (err && typeof err === "object" && "code" in err && typeof err.code === "string") return err.code;
  return undefined;
}

export function isPidRunning(pid: number): boolean {
  try {
    // signal 0 checks existence without killing
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // ESRCH: gone. EPERM: exists but not ours, still running.
    return errorCode(err) === "EPERM";
  }
}

export function acquireLock(lockFile: string, pid: number = process.pid): boolean {
  if (fs.existsSync(lockFile)) {
    const existingPid = parseInt(fs.readFileSync(lockFile, "utf8").trim(), 10);

    if (!isNaN(existingPid) && existingPid !== pid && isPidRunning(existingPid)) {
      bootLog.error(`Narrator already running (PID ${existingPid}). Exiting.`);
      return false;
    }

    bootLog.info(`Stale lock file detected (PID ${existingPid}). Overwriting.`);
  }

  const dataDir = path.dirname(lockFile);
  if (!fs.existsSync(dataDir)) {
    fs.mkdirSync(dataDir, { recursive: true });
  }

  fs.writeFileSync(lockFile, pid.toString(), "utf8");
  bootLog.info(`PID lock acquired (${pid})`);

  return true;
}

export function releaseLock(lockFile: string): void {
  if (fs.existsSync(lockFile)) {
    fs.unlinkSync(lockFile);
    bootLog.info("PID lock released");
  }
}
