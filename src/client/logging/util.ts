// Copyright (c) Microsoft Corporation. All rights reserved.
// Licensed under the MIT License.
'use strict';

import { Arguments } from './types';

function describeArgument(item: unknown): string {
    if (typeof item === 'object' && item !== null && 'getClassName' in item) {
        const getClassName = item.getClassName;
        if (typeof getClassName === 'function') {
            return `<class:${String(getClassName.call(item))}>`;
        }
    }
    return JSON.stringify(item);
}

export function argsToLogString(args: Arguments): string {
    const argStrings = args.map((item, index) => {
        if (item === undefined) {
            return `Arg ${index + 1}: undefined`;
        }
        if (item === null) {
            return `Arg ${index + 1}: null`;
        }
        try {
            return `Arg ${index + 1}: ${describeArgument(item)}`;
        } catch {
            return `Arg ${index + 1}: <argument cannot be serialized for logging>`;
        }
    });
    return argStrings.join(', ');
}

export function returnValueToLogString(returnValue: unknown): string {
    const returnValueMessage = 'Return Value: ';
    if (returnValue === undefined) {
        return `${returnValueMessage}undefined`;
    }
    if (returnValue === null) {
        return `${returnValueMessage}null`;
    }
    if (
        typeof returnValue === 'object' &&
        'kind' in returnValue &&
        returnValue.toString !== Object.prototype.toString
    ) {
        // Built tests describe themselves; their internals are not worth dumping.
        return `${returnValueMessage}${String(returnValue)}`;
    }
    try {
        return `${returnValueMessage}${JSON.stringify(returnValue)}`;
    } catch {
        return `${returnValueMessage}<Return value cannot be serialized for logging>`;
    }
}
