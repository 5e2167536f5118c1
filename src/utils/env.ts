import dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';

const ENV_FILES = ['.env.local', '.env'];

/**
 * Process environment, seeded once from the first of `.env.local` or `.env`
 * found in the working directory. Variables already set in the process win
 * over the file.
 */
export class EnvLoader {
  private static loadedFrom: string | null | undefined;

  public static initialize(cwd: string = process.cwd()): void {
    if (this.loadedFrom !== undefined) {
      return;
    }

    const envFile = ENV_FILES.map(name => path.join(cwd, name)).find(candidate => fs.existsSync(candidate));
    if (envFile) {
      dotenv.config({ path: envFile });
    }
    this.loadedFrom = envFile ?? null;
  }

  /** The file the environment was seeded from, if any. */
  public static source(): string | null {
    this.initialize();
    return this.loadedFrom ?? null;
  }

  /** Blank values count as unset. */
  public static get(key: string, defaultValue?: string): string | undefined {
    this.initialize();
    const value = process.env[key]?.trim();
    return value ? value : defaultValue;
  }

  public static getNumber(key: string, defaultValue?: number): number | undefined {
    const raw = this.get(key);
    const parsed = raw === undefined ? NaN : Number(raw);
    return Number.isFinite(parsed) ? parsed : defaultValue;
  }
}

export const env = {
  get: EnvLoader.get.bind(EnvLoader),
  getNumber: EnvLoader.getNumber.bind(EnvLoader)
};
