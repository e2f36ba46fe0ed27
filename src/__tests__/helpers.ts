import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import pino from 'pino';
import { load, type ConfigLayer, type Configuration } from '../config';
import type { Logger } from '../logger';
import type { TaskRegistrar } from '../recurrence';
import type { EngineRun, TranscodeEngine, TranscodeRequest, WorkItem } from '../types';

export const silentLogger = (): Logger => pino({ level: 'silent' });

export type LogRecord = Record<string, unknown> & { level: number; msg: string };

// pino writing JSON lines into memory
export function captureLogger(): { logger: Logger; records: () => LogRecord[]; lines: string[] } {
  const lines: string[] = [];
  const logger = pino(
    { level: 'debug' },
    {
      write(msg: string) {
        lines.push(msg);
      },
    }
  );
  const records = () => lines.map((line): LogRecord => JSON.parse(line));
  return { logger, records, lines };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'transcode-batch-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export function makeConfig(overrides: ConfigLayer = {}): Configuration {
  return load({ overrides: { logFile: path.join(os.tmpdir(), 'transcode-batch-test.log'), ...overrides } });
}

export async function makeItem(dir: string, name: string, content = 'source-bytes'): Promise<WorkItem> {
  const sourcePath = path.join(dir, name);
  await fs.writeFile(sourcePath, content);
  return {
    sourcePath,
    displayName: path.parse(name).name,
    sizeBytes: Buffer.byteLength(content),
    discoveredAt: new Date('2024-01-01T00:00:00Z'),
  };
}

export async function makeItems(dir: string, count: number): Promise<WorkItem[]> {
  const items: WorkItem[] = [];
  for (let i = 1; i <= count; i++) {
    items.push(await makeItem(dir, `video-${String(i).padStart(3, '0')}.mkv`));
  }
  return items;
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.stat(filePath);
    return true;
  } catch {
    return false;
  }
}

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// `output` is written to the destination before the run is returned
export type ScriptedRun = EngineRun & { output?: string };
export type EngineScript = (request: TranscodeRequest) => ScriptedRun | Promise<ScriptedRun>;

export const succeed: EngineScript = () => ({ exitCode: 0, stderr: '', output: 'transcoded' });

// In-process engine that counts how many transcodes run at the same time
export class FakeEngine implements TranscodeEngine {
  readonly requests: TranscodeRequest[] = [];
  active = 0;
  maxActive = 0;

  constructor(
    private readonly script: EngineScript = succeed,
    private readonly delayMs = 0
  ) {}

  async transcode(request: TranscodeRequest): Promise<EngineRun> {
    this.requests.push(request);
    this.active += 1;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.delayMs > 0) await sleep(this.delayMs);
      const run = await this.script(request);
      if (run.output !== undefined) await fs.writeFile(request.destinationPath, run.output);
      return { exitCode: run.exitCode, exitSignal: run.exitSignal, stderr: run.stderr };
    } finally {
      this.active -= 1;
    }
  }
}

// Crontab stand-in holding its rules in memory
export class MemoryRegistrar implements TaskRegistrar {
  constructor(public rules: string[] = []) {}

  async readRules(): Promise<string[]> {
    return [...this.rules];
  }

  async writeRules(rules: string[]): Promise<void> {
    this.rules = [...rules];
  }
}
