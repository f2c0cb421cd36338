/**
 * `pomobar doctor`: diagnose configuration and environment.
 */

import { spawnSync } from 'node:child_process';
import { createConnection } from 'node:net';
import { stat } from 'node:fs/promises';
import { dirname } from 'node:path';
import { ConfigError, loadConfig } from '../lib/config.js';
import type { PomobarConfig } from '../types/config.js';

export type CheckStatus = 'OK' | 'WARN' | 'FAIL' | 'INFO' | 'SKIP';

export interface DoctorCheck {
  status: CheckStatus;
  message: string;
}

export interface DoctorReport {
  checks: DoctorCheck[];
  /** Problems that keep pomobar from working */
  issues: string[];
}

/**
 * Resolves true if something accepts connections on `socketPath`.
 *
 * The probe sends no data; the display ignores empty connections.
 */
export function probeEndpoint(socketPath: string, timeoutMs = 1000): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = createConnection(socketPath);
    const timer = setTimeout(() => {
      socket.destroy();
      resolve(false);
    }, timeoutMs);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.end();
      resolve(true);
    });
    socket.once('error', () => {
      clearTimeout(timer);
      socket.destroy();
      resolve(false);
    });
  });
}

/**
 * Returns true if `command` can be executed from PATH.
 */
export function commandExists(command: string): boolean {
  const result = spawnSync('sh', ['-c', 'command -v "$1"', 'sh', command], { stdio: 'ignore' });
  return result.status === 0;
}

async function checkRuntimeDir(config: PomobarConfig, report: DoctorReport): Promise<void> {
  const dir = dirname(config.socket_path);
  try {
    const info = await stat(dir);
    if (info.isDirectory()) {
      report.checks.push({ status: 'OK', message: `Endpoint directory exists: ${dir}` });
    } else {
      report.checks.push({ status: 'FAIL', message: `Endpoint directory is not a directory: ${dir}` });
      report.issues.push(`${dir} is not a directory`);
    }
  } catch (error) {
    report.checks.push({ status: 'FAIL', message: `Endpoint directory missing: ${dir}` });
    report.issues.push(`Cannot use ${dir}: ${error instanceof Error ? error.message : String(error)}`);
  }
}

/**
 * Runs all checks without printing.
 */
export async function runDoctor(options: { configPath?: string; socketPath?: string } = {}): Promise<DoctorReport> {
  const report: DoctorReport = { checks: [], issues: [] };

  let config: PomobarConfig;
  try {
    const loaded = await loadConfig({
      configPath: options.configPath,
      overrides: { socket_path: options.socketPath },
    });
    config = loaded.config;
    report.checks.push({
      status: 'OK',
      message: loaded.source ? `Config loaded from ${loaded.source}` : 'No config file, using defaults',
    });
  } catch (error) {
    if (error instanceof ConfigError) {
      report.checks.push({ status: 'FAIL', message: error.message });
      report.issues.push('Configuration is invalid');
      return report;
    }
    throw error;
  }

  report.checks.push({
    status: 'INFO',
    message: `Work ${config.work_minutes} min, break ${config.break_minutes} min, poll ${config.poll_interval_ms} ms`,
  });
  report.checks.push({ status: 'INFO', message: `Endpoint: ${config.socket_path}` });

  await checkRuntimeDir(config, report);

  if (await probeEndpoint(config.socket_path)) {
    report.checks.push({ status: 'OK', message: 'A display is listening' });
  } else {
    report.checks.push({ status: 'WARN', message: 'No display is listening (start one with `pomobar display`)' });
  }

  if (!config.notifications.enabled) {
    report.checks.push({ status: 'SKIP', message: 'Notifications disabled' });
  } else if (commandExists(config.notifications.command)) {
    report.checks.push({ status: 'OK', message: `Notifier available: ${config.notifications.command}` });
  } else {
    report.checks.push({
      status: 'WARN',
      message: `Notifier '${config.notifications.command}' not found; notifications will be skipped`,
    });
  }

  return report;
}

/**
 * Prints the doctor report.
 *
 * @returns true when no issues were found
 */
export async function doctorCommand(options: { configPath?: string; socketPath?: string } = {}): Promise<boolean> {
  console.log('pomobar doctor - checking configuration and environment\n');
  const report = await runDoctor(options);

  for (const check of report.checks) {
    console.log(`[${check.status}] ${check.message}`);
  }

  console.log('\n--- Summary ---');
  if (report.issues.length === 0) {
    console.log('All checks passed.');
    return true;
  }
  console.log(`Found ${report.issues.length} issue(s):\n`);
  for (const issue of report.issues) {
    console.log(`  - ${issue}`);
  }
  return false;
}
