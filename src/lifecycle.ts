/**
 * Process lifecycle: home directory scaffold and PID file.
 */
import fs from 'fs-extra';
import { relayPaths } from './config.js';
import { errnoCode } from './devkit/errors.js';

/** Ensure ~/.pkgrelay/ exists */
export function scaffold(): void {
  fs.ensureDirSync(relayPaths().home);
}

/** Write PID file. Returns false if another live instance holds it. */
export function writePid(): boolean {
  const { pid: pidFile } = relayPaths();
  const existing = readPid();
  if (existing !== null && existing !== process.pid) return false;
  fs.writeFileSync(pidFile, String(process.pid), 'utf-8');
  return true;
}

/** Remove PID file if it is ours */
export function removePid(): void {
  const { pid: pidFile } = relayPaths();
  if (readPid() === process.pid) fs.removeSync(pidFile);
}

/** Check if a process with the given PID is running */
function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: alive but owned by someone else
    return errnoCode(err) === 'EPERM';
  }
}

/** Read PID from PID file, or null if not running (a stale file is removed) */
export function readPid(): number | null {
  const { pid: pidFile } = relayPaths();
  if (!fs.existsSync(pidFile)) return null;
  const pid = parseInt(fs.readFileSync(pidFile, 'utf-8').trim(), 10);
  if (isNaN(pid) || !isProcessRunning(pid)) {
    fs.removeSync(pidFile);
    return null;
  }
  return pid;
}
