// Copyright (c) Microsoft Corporation. All rights reserved.
// Licensed under the MIT License.

'use strict';

export class StopWatch {
    private readonly started = Date.now();
    public get elapsedTime(): number {
        return Date.now() - this.started;
    }
}
