// Copyright (c) Microsoft Corporation. All rights reserved.
// Licensed under the MIT License.
'use strict';

export {
    // aliases
    // (for convenience)
    traceDecorators,
    traceError,
    traceInfo,
    traceVerbose,
    traceWarning
} from './_trace';
export { addLogTransport, getLogLevel, setLogLevel } from './logger';
export { LogLevel, TraceOptions } from './types';
