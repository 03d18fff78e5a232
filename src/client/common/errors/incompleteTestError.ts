// Copyright (c) Microsoft Corporation. All rights reserved.
// Licensed under the MIT License.

'use strict';

// Thrown by a data provider to mark the tests it feeds as incomplete.
export class IncompleteTestError extends Error {
    constructor(message: string = '') {
        super(message);
        this.name = 'IncompleteTestError';
    }
}
