// Copyright (c) Microsoft Corporation. All rights reserved.
// Licensed under the MIT License.
'use strict';

import type { Format, TransformableInfo } from 'logform';
import { format } from 'winston';
import { FormatterOptions } from './types';

const TIMESTAMP = 'YYYY-MM-DD HH:mm:ss';

// Pick the letter shown in front of each log line.
function levelPrefix(level: string): string {
    return level.substring(0, 1).toUpperCase();
}

function formatMessage(info: TransformableInfo): string {
    const label = typeof info.label === 'string' && info.label.length > 0 ? `${info.label} ` : '';
    return `${label}${levelPrefix(info.level)} ${String(info.timestamp)}: ${String(info.message)}`;
}

// Create a log formatter to format log records.
export function getFormatter(opts: FormatterOptions = {}): Format {
    return format.combine(format.label({ label: opts.label ?? '' }), format.timestamp({ format: TIMESTAMP }), format.printf(formatMessage));
}
