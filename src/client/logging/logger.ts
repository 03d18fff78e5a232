// Copyright (c) Microsoft Corporation. All rights reserved.
// Licensed under the MIT License.
'use strict';

import * as util from 'util';
import { createLogger as createWinstonLogger, Logger } from 'winston';
import TransportStream from 'winston-transport';
import { isCI, isTestExecution } from '../common/constants';
import { getFormatter } from './formatters';
import { getConsoleTransport, getFileTransport } from './transports';
import { Arguments, LoggerConfig, LogLevel } from './types';

// Convert from LogLevel enum to winston (npm) level names.
const logLevelMap: Record<LogLevel, string> = {
    [LogLevel.Error]: 'error',
    [LogLevel.Warn]: 'warn',
    [LogLevel.Info]: 'info',
    [LogLevel.Debug]: 'debug'
};

export function resolveLevel(name: string | undefined): LogLevel | undefined {
    switch (name?.trim().toLowerCase()) {
        case 'error':
            return LogLevel.Error;
        case 'warn':
        case 'warning':
            return LogLevel.Warn;
        case 'info':
            return LogLevel.Info;
        case 'debug':
        case 'verbose':
            return LogLevel.Debug;
        default:
            return undefined;
    }
}

export function createLogger(): Logger {
    return createWinstonLogger({ level: logLevelMap[LogLevel.Info] });
}

/**
 * Work out the logging setup from the environment.
 *
 * Console logging is on unless a test run is in progress and nobody forced it
 * (`TEST_BUILDER_FORCE_LOGGING`). `TEST_BUILDER_LOG_FILE` adds a file transport
 * and `TEST_BUILDER_LOG_LEVEL` picks the threshold.
 */
export function getPreDefinedConfiguration(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
    const config: LoggerConfig = {};

    const level = resolveLevel(env.TEST_BUILDER_LOG_LEVEL);
    if (level !== undefined) {
        config.level = level;
    }
    if (!isTestExecution() || env.TEST_BUILDER_FORCE_LOGGING) {
        config.console = {};
        // In CI there's no need for the label.
        if (!isCI) {
            config.console.label = 'Test Builder:';
        }
    }
    if (env.TEST_BUILDER_LOG_FILE) {
        config.file = {
            logfile: env.TEST_BUILDER_LOG_FILE
        };
    }
    return config;
}

// Set up a logger just the way we like it.
export function configureLogger(logger: Logger, config: LoggerConfig): void {
    if (config.level !== undefined) {
        logger.level = logLevelMap[config.level];
    }
    if (config.console) {
        logger.add(getConsoleTransport(getFormatter(config.console)));
    }
    if (config.file) {
        logger.add(getFileTransport(config.file.logfile, getFormatter()));
    }
}

// Initialize the logger as soon as this module is imported.
const globalLogger = createLogger();
configureLogger(globalLogger, getPreDefinedConfiguration());

// Emit a log message derived from the args to all enabled transports.
export function logTo(logger: Logger, logLevel: LogLevel, args: Arguments): void {
    // winston complains loudly when written to without transports.
    if (logger.transports.length === 0) {
        return;
    }
    const message = args.length === 0 ? '' : util.format(args[0], ...args.slice(1));
    logger.log(logLevelMap[logLevel], message);
}

export function log(logLevel: LogLevel, ...args: Arguments): void {
    logTo(globalLogger, logLevel, args);
}

export function setLogLevel(logLevel: LogLevel): void {
    globalLogger.level = logLevelMap[logLevel];
}

export function getLogLevel(): LogLevel {
    return resolveLevel(globalLogger.level) ?? LogLevel.Info;
}

/**
 * Route log output to an extra transport (e.g. a host's output window).
 * Returns a function that removes the transport again.
 */
export function addLogTransport(transport: TransportStream): () => void {
    globalLogger.add(transport);
    return () => {
        globalLogger.remove(transport);
    };
}
