import chalk from 'chalk';
import type { LogLevelName } from '../types/index.js';

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
}

const LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
};

export class Logger {
    private static level: LogLevel = LogLevel.INFO;

    static setLevel(level: LogLevel | LogLevelName) {
        this.level = typeof level === 'string' ? LEVELS_BY_NAME[level] : level;
    }

    static info(message: string) {
        if (this.level <= LogLevel.INFO) {
            console.log(chalk.blue('info: ') + message);
        }
    }

    static warn(message: string) {
        if (this.level <= LogLevel.WARN) {
            console.error(chalk.yellow('warn: ') + message);
        }
    }

    static error(message: string, error?: unknown) {
        if (this.level <= LogLevel.ERROR) {
            console.error(chalk.red('error: ') + message);
            if (error) {
                console.error(error);
            }
        }
    }

    // stderr, so debug traces never mix with the staged-file echo on stdout
    static debug(message: string) {
        if (this.level <= LogLevel.DEBUG) {
            console.error(chalk.dim('debug: ') + message);
        }
    }
}
