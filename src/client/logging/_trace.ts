// Copyright (c) Microsoft Corporation. All rights reserved.
// Licensed under the MIT License.
'use strict';

import { StopWatch } from '../common/utils/stopWatch';
import { log } from './logger';
import { Arguments, LogLevel, TraceOptions } from './types';
import { argsToLogString, returnValueToLogString } from './util';

export function traceVerbose(...args: Arguments): void {
    log(LogLevel.Debug, ...args);
}

export function traceError(...args: Arguments): void {
    log(LogLevel.Error, ...args);
}

export function traceInfo(...args: Arguments): void {
    log(LogLevel.Info, ...args);
}

export function traceWarning(...args: Arguments): void {
    log(LogLevel.Warn, ...args);
}

export namespace traceDecorators {
    const DEFAULT_OPTS: TraceOptions = TraceOptions.Arguments | TraceOptions.ReturnValue;

    export function verbose(message: string, opts: TraceOptions = DEFAULT_OPTS) {
        return trace({ message, opts });
    }
    export function error(message: string) {
        const opts = DEFAULT_OPTS;
        const level = LogLevel.Error;
        return trace({ message, opts, level });
    }
    export function info(message: string) {
        const opts = TraceOptions.None;
        const level = LogLevel.Info;
        return trace({ message, opts, level });
    }
    export function warn(message: string) {
        const opts = DEFAULT_OPTS;
        const level = LogLevel.Warn;
        return trace({ message, opts, level });
    }
}

type LogInfo = {
    opts: TraceOptions;
    message: string;
    level?: LogLevel;
};

type CallInfo = {
    kind: string;
    name: string;
    args: Arguments;
};

type TraceInfo = CallInfo & {
    elapsed: number;
    returnValue?: unknown;
    err?: unknown;
};

export function formatMessages(info: LogInfo, traced: TraceInfo): string {
    const messages = [info.message];
    messages.push(
        `${traced.kind} name = ${traced.name}`.trim(),
        `completed in ${traced.elapsed}ms`,
        `has a ${traced.returnValue ? 'truthy' : 'falsy'} return value`
    );
    if ((info.opts & TraceOptions.Arguments) === TraceOptions.Arguments) {
        messages.push(argsToLogString(traced.args));
    }
    if ((info.opts & TraceOptions.ReturnValue) === TraceOptions.ReturnValue) {
        messages.push(returnValueToLogString(traced.returnValue));
    }
    return messages.join(', ');
}

function trace(logInfo: LogInfo) {
    return function (target: object, _propertyKey: string | symbol, descriptor: PropertyDescriptor): PropertyDescriptor {
        const originalMethod: unknown = descriptor.value;
        if (typeof originalMethod !== 'function') {
            return descriptor;
        }
        const className = target.constructor ? target.constructor.name : '';
        function writeSuccess(info: TraceInfo) {
            // Error tracing only reports failures.
            if (logInfo.level === undefined || logInfo.level > LogLevel.Error) {
                log(logInfo.level ?? LogLevel.Debug, formatMessages(logInfo, info));
            }
        }
        function writeError(info: TraceInfo) {
            log(LogLevel.Error, formatMessages(logInfo, info), info.err);
        }
        descriptor.value = function (this: unknown, ...args: Arguments): unknown {
            const call: CallInfo = { kind: 'Class', name: className, args };
            const timer = new StopWatch();
            try {
                const result: unknown = Reflect.apply(originalMethod, this, args);
                // If method being wrapped returns a promise then wait for it.
                if (result instanceof Promise) {
                    return result.then(
                        (data: unknown) => {
                            writeSuccess({ ...call, elapsed: timer.elapsedTime, returnValue: data });
                            return data;
                        },
                        (ex: unknown) => {
                            writeError({ ...call, elapsed: timer.elapsedTime, err: ex });
                            throw ex;
                        }
                    );
                }
                writeSuccess({ ...call, elapsed: timer.elapsedTime, returnValue: result });
                return result;
            } catch (ex) {
                writeError({ ...call, elapsed: timer.elapsedTime, err: ex });
                throw ex;
            }
        };

        return descriptor;
    };
}
