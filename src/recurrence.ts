import { spawn } from 'node:child_process';
import path from 'node:path';
import cron from 'node-cron';
import { errorMessage, hasErrorCode, RegistrationError, ValidationError } from './errors';
import type { EventLog } from './eventLog';
import type { RecurrenceRule } from './types';

const HOURS_PER_DAY = 24;
const HOURS_PER_WEEK = 168;
const WEEKLY_DAY = 0; // Sunday

// Intervals cron can express, for help text and error messages
export const SUPPORTED_INTERVALS = '1-23, 168, or a whole number of days (24, 48, ...)';

export type TimeOfDay = { hour: number; minute: number };

// Parse "HH:MM" (or "H:MM") into hour and minute
export function parseTimeOfDay(value: string): TimeOfDay {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  const hour = Number(match?.[1]);
  const minute = Number(match?.[2]);
  if (!match || hour > 23 || minute > 59) {
    throw new ValidationError([`timeOfDay: expected HH:MM, got "${value}"`]);
  }
  return { hour, minute };
}

// Five-field cron expression for "every `intervalHours` starting at `timeOfDay`".
// 24 runs daily and 168 weekly on Sunday. Divisors of 24 list every hour of the cycle
// anchored on the start hour; other values below 24 restart from the start hour each day;
// multiples of 24 step over days of the month.
export function buildScheduleExpression(timeOfDay: string, intervalHours: number): string {
  const { hour, minute } = parseTimeOfDay(timeOfDay);
  if (!Number.isInteger(intervalHours) || intervalHours < 1) {
    throw new ValidationError([`intervalHours: must be a positive whole number, got ${intervalHours}`]);
  }

  let expression: string;
  if (intervalHours === HOURS_PER_DAY) {
    expression = `${minute} ${hour} * * *`;
  } else if (intervalHours === HOURS_PER_WEEK) {
    expression = `${minute} ${hour} * * ${WEEKLY_DAY}`;
  } else if (intervalHours === 1) {
    expression = `${minute} * * * *`;
  } else if (intervalHours < HOURS_PER_DAY && HOURS_PER_DAY % intervalHours === 0) {
    const hours: number[] = [];
    for (let h = hour % intervalHours; h < HOURS_PER_DAY; h += intervalHours) hours.push(h);
    expression = `${minute} ${hours.join(',')} * * *`;
  } else if (intervalHours < HOURS_PER_DAY) {
    expression = `${minute} ${hour}-23/${intervalHours} * * *`;
  } else if (intervalHours % HOURS_PER_DAY === 0) {
    expression = `${minute} ${hour} */${intervalHours / HOURS_PER_DAY} * *`;
  } else {
    throw new ValidationError([`intervalHours: ${intervalHours} cannot be scheduled, use ${SUPPORTED_INTERVALS}`]);
  }

  // Syntax check only; cron itself decides the run times
  if (!cron.validate(expression)) {
    throw new ValidationError([`scheduleExpression: "${expression}" is not a valid cron expression`]);
  }
  return expression;
}

// crontab hands the line to /bin/sh, and treats a bare % as a newline
export function quoteArg(arg: string): string {
  if (/^[\w@+=:,./-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`).replace(/%/g, '\\%')}'`;
}

// One crontab line: expression followed by the quoted command
export function formatRule(rule: RecurrenceRule): string {
  return `${rule.scheduleExpression} ${rule.command.map(quoteArg).join(' ')}`;
}

// Where recurring rules are persisted
export interface TaskRegistrar {
  readRules(): Promise<string[]>;
  writeRules(rules: string[]): Promise<void>;
}

type ProcessOutput = { code: number | null; stdout: string; stderr: string };

// Run a command to completion; stdin is only opened when there is input to feed it
function runProcess(command: string, args: string[], input?: string): Promise<ProcessOutput> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, { stdio: [input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'] });
    let stdout = '';
    let stderr = '';
    child.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });
    child.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
    });
    child.on('error', reject);
    child.on('close', (code) => resolve({ code, stdout, stderr }));

    // Feed the rule text once the process exists
    if (input !== undefined && child.stdin) {
      const stdin = child.stdin;
      stdin.on('error', reject);
      child.on('spawn', () => stdin.end(input));
    }
  });
}

// The current user's crontab, read with `crontab -l` and replaced wholesale with `crontab -`
export class CrontabRegistrar implements TaskRegistrar {
  constructor(private readonly binary: string = 'crontab') {}

  async readRules(): Promise<string[]> {
    const out = await this.run(['-l']);
    if (out.code !== 0) {
      // an empty crontab is reported as an error by most implementations
      if (/no crontab/i.test(out.stderr)) return [];
      throw new RegistrationError(`crontab -l exited with code ${out.code}: ${out.stderr.trim()}`);
    }
    return out.stdout.split('\n').filter((line) => line.trim().length > 0);
  }

  async writeRules(rules: string[]): Promise<void> {
    const out = await this.run(['-'], `${rules.join('\n')}\n`);
    if (out.code !== 0) {
      throw new RegistrationError(
        `crontab - exited with code ${out.code}: ${out.stderr.trim() || 'permission denied?'}`
      );
    }
  }

  // Spawn failures mean the registrar is unavailable
  private async run(args: string[], input?: string): Promise<ProcessOutput> {
    try {
      return await runProcess(this.binary, args, input);
    } catch (err) {
      const reason = hasErrorCode(err, 'ENOENT') ? `${this.binary} is not installed` : errorMessage(err);
      throw new RegistrationError(`Task registrar unavailable: ${reason}`, { cause: err });
    }
  }
}

export type RegisterOptions = {
  args?: readonly string[]; // arguments placed after the invocation path
  registrar?: TaskRegistrar;
  eventLog?: EventLog;
};

export type Registration = { rule: RecurrenceRule; added: boolean };

// Build the rule; bad input surfaces as a RegistrationError like any other registrar failure
function buildRule(
  timeOfDay: string,
  intervalHours: number,
  invocationPath: string,
  args: readonly string[]
): RecurrenceRule {
  try {
    if (!path.isAbsolute(invocationPath)) {
      throw new ValidationError([`invocationPath: must be absolute, got "${invocationPath}"`]);
    }
    return Object.freeze({
      timeOfDay,
      intervalHours,
      scheduleExpression: buildScheduleExpression(timeOfDay, intervalHours),
      command: Object.freeze([invocationPath, ...args]),
    });
  } catch (err) {
    const reason = err instanceof ValidationError ? err.issues.join('; ') : errorMessage(err);
    throw new RegistrationError(`Cannot register schedule: ${reason}`, { cause: err });
  }
}

// Append one recurring rule that invokes `invocationPath`. Existing rules are kept;
// a line identical to the new one is not written twice.
export async function register(
  timeOfDay: string,
  intervalHours: number,
  invocationPath: string,
  options: RegisterOptions = {}
): Promise<Registration> {
  try {
    const rule = buildRule(timeOfDay, intervalHours, invocationPath, options.args ?? []);
    const registrar = options.registrar ?? new CrontabRegistrar();
    const line = formatRule(rule);

    // Read, then write back with the new line appended
    const existing = await registrar.readRules();
    const added = !existing.some((l) => l.trim() === line);
    if (added) await registrar.writeRules([...existing, line]);

    options.eventLog?.record({ type: 'schedule.registered', rule, added });
    return { rule, added };
  } catch (err) {
    options.eventLog?.record({ type: 'schedule.failed', timeOfDay, intervalHours, error: errorMessage(err) });
    throw err;
  }
}

// Registration never touches a running batch: it only edits the registrar's rule set.
