import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';

export interface Logger {
  info(message: string): Promise<void>;
  warn(message: string): Promise<void>;
  error(message: string): Promise<void>;
}

function nowIso(): string {
  return new Date().toISOString();
}

export class RunLogger implements Logger {
  constructor(
    private readonly filePath: string,
    private readonly runLabel = 'Scrape run',
    private readonly echo = true,
  ) {}

  async init(): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await writeFile(this.filePath, '', 'utf8');
    await this.write(`=== ${this.runLabel} started ${nowIso()} ===`);
  }

  async info(message: string): Promise<void> {
    await this.write(`[INFO] ${message}`);
  }

  async warn(message: string): Promise<void> {
    await this.write(`[WARN] ${message}`);
  }

  async error(message: string): Promise<void> {
    await this.write(`[ERROR] ${message}`);
  }

  async close(): Promise<void> {
    await this.write(`=== ${this.runLabel} finished ${nowIso()} ===`);
  }

  private async write(message: string): Promise<void> {
    const line = `${nowIso()} ${message}`;
    if (this.echo) {
      // eslint-disable-next-line no-console
      console.log(line);
    }
    await appendFile(this.filePath, `${line}\n`, 'utf8');
  }
}
