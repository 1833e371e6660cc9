import dotenv from "dotenv";
import { InvalidArgumentError } from "./utils/errors";

/** Counting defaults read from the environment; pass it as the options of computeTally. */
export interface CountingConfig {
    winPercentage: number; // IRV win percentage
    startingAt: 0 | 1; // Borda points for a last choice
}

const DEFAULT_WIN_PERCENTAGE = 50;
const DEFAULT_BORDA_STARTING_AT = 1;

function readNumber(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
    const raw = env[key];
    if (raw === undefined || raw.trim() === "") return fallback;
    const value = Number(raw);
    if (Number.isNaN(value)) {
        throw new InvalidArgumentError(`${key} must be a number, but was ${JSON.stringify(raw)}`);
    }
    return value;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CountingConfig {
    const winPercentage = readNumber(env, "IRV_WIN_PERCENTAGE", DEFAULT_WIN_PERCENTAGE);
    if (winPercentage < 50 || winPercentage > 100) {
        throw new InvalidArgumentError(`IRV_WIN_PERCENTAGE must be between 50 and 100, but was ${winPercentage}`);
    }

    const startingAt = readNumber(env, "BORDA_STARTING_AT", DEFAULT_BORDA_STARTING_AT);
    if (startingAt !== 0 && startingAt !== 1) {
        throw new InvalidArgumentError(`BORDA_STARTING_AT must be 0 or 1, but was ${startingAt}`);
    }

    return { winPercentage, startingAt: startingAt === 0 ? 0 : 1 };
}

/**
 * Like loadConfig, but also reads a .env file. The file is parsed into a copy of
 * `base`, so process.env is left as it is and variables already set in `base` win.
 */
export function loadConfigFromFile(path: string, base: NodeJS.ProcessEnv = process.env): CountingConfig {
    const env: Record<string, string> = {};
    for (const [key, value] of Object.entries(base)) {
        if (value !== undefined) env[key] = value;
    }
    const { error } = dotenv.config({ path, processEnv: env });
    if (error) throw new InvalidArgumentError(`Cannot read configuration from ${path}: ${error.message}`);
    return loadConfig(env);
}
