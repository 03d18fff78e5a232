// Copyright (c) Microsoft Corporation. All rights reserved.
// Licensed under the MIT License.
'use strict';

import type { Format } from 'logform';
import * as path from 'path';
import { transports } from 'winston';
import TransportStream from 'winston-transport';

const formattedMessage = Symbol.for('message');

export type LogEntry = {
    level: string;
    message: unknown;
    [formattedMessage]?: string;
};

class ConsoleTransport extends TransportStream {
    public log(info: LogEntry, next: () => void): void {
        setImmediate(() => this.emit('logged', info));
        const line = info[formattedMessage] ?? String(info.message);
        if (info.level === 'error' || info.level === 'warn') {
            console.error(line);
        } else {
            console.log(line);
        }
        next();
    }
}

// Create a console-targeting transport that can be added to a winston logger.
export function getConsoleTransport(formatter: Format): TransportStream {
    return new ConsoleTransport({
        // We minimize customization.
        format: formatter
    });
}

// Create a file-targeting transport that can be added to a winston logger.
export function getFileTransport(logfile: string, formatter: Format): TransportStream {
    return new transports.File({
        format: formatter,
        filename: path.resolve(logfile),
        handleExceptions: true
    });
}
