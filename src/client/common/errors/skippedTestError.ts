// Copyright (c) Microsoft Corporation. All rights reserved.
// Licensed under the MIT License.

'use strict';

// Thrown by a data provider to skip the tests it feeds.
export class SkippedTestError extends Error {
    constructor(message: string = '') {
        super(message);
        this.name = 'SkippedTestError';
    }
}
