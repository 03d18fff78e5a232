// Copyright (c) Microsoft Corporation. All rights reserved.
// Licensed under the MIT License.

'use strict';

/**
 * Raised when a test class declares no constructor, so no test can be built from it.
 */
export class NoValidTestError extends Error {
    constructor() {
        super('No valid test provided.');
        this.name = 'NoValidTestError';
    }
}
