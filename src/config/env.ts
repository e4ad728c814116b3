import * as dotenv from 'dotenv';
import { SINGLE_PRECISION_EPSILON } from '../geometry/constants';
import { ConfigurationError } from '../utils/errors';

dotenv.config();

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Config {
    epsilon: number;
    logLevel: LogLevel;
    logFile?: string;
}

const isLogLevel = (value: string): value is LogLevel =>
    LOG_LEVELS.some((level) => level === value);

const parseEpsilon = (raw: string | undefined): number => {
    if (raw === undefined || raw.trim() === '') return SINGLE_PRECISION_EPSILON;
    const epsilon = Number(raw);
    if (!Number.isFinite(epsilon) || epsilon <= 0) {
        throw new ConfigurationError('VECTOR_EPSILON', raw);
    }
    return epsilon;
};

const parseLogLevel = (raw: string | undefined): LogLevel => {
    if (raw === undefined || raw.trim() === '') return 'info';
    const level = raw.trim().toLowerCase();
    if (!isLogLevel(level)) {
        throw new ConfigurationError('LOG_LEVEL', raw);
    }
    return level;
};

export const loadConfig = (env: NodeJS.ProcessEnv): Readonly<Config> => {
    const logFile = env.LOG_FILE?.trim();
    return Object.freeze({
        epsilon: parseEpsilon(env.VECTOR_EPSILON),
        logLevel: parseLogLevel(env.LOG_LEVEL),
        ...(logFile ? { logFile } : {}),
    });
};

export const config = loadConfig(process.env);
