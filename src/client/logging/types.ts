// Copyright (c) Microsoft Corporation. All rights reserved.
// Licensed under the MIT License.
'use strict';

export enum LogLevel {
    Error = 10,
    Warn = 20,
    Info = 30,
    Debug = 40
}

// Knobs used when creating a formatter.
export type FormatterOptions = {
    label?: string;
};

// The information we want to log.
export enum TraceOptions {
    None = 0,
    Arguments = 1,
    ReturnValue = 2
}

export type LoggerConfig = {
    level?: LogLevel;
    console?: FormatterOptions;
    file?: {
        logfile: string;
    };
};

export type Arguments = unknown[];
