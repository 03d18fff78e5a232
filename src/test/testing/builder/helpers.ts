// Copyright (c) Microsoft Corporation. All rights reserved.
// Licensed under the MIT License.

'use strict';

import * as typemoq from 'typemoq';
import { BackupSettings, ITestMetadataResolver, ProvidedDataResult } from '../../../client/testing/builder/types';

export type ResolverAnswers = {
    backupSettings?: BackupSettings;
    preserveGlobalState?: boolean;
    processIsolation?: boolean;
    classProcessIsolation?: boolean;
    providedData?: ProvidedDataResult;
    groups?: readonly string[];
};

/**
 * A resolver mock answering every query, with fixed answers for the given class/method.
 */
export function createResolver(answers: ResolverAnswers = {}): typemoq.IMock<ITestMetadataResolver> {
    const resolver = typemoq.Mock.ofType<ITestMetadataResolver>();
    resolver
        .setup((r) => r.backupSettings(typemoq.It.isAny()))
        .returns(() => answers.backupSettings ?? { backupGlobals: undefined, backupStaticAttributes: undefined });
    resolver.setup((r) => r.preserveGlobalState(typemoq.It.isAny())).returns(() => answers.preserveGlobalState);
    resolver.setup((r) => r.processIsolation(typemoq.It.isAny())).returns(() => answers.processIsolation ?? false);
    resolver
        .setup((r) => r.classProcessIsolation(typemoq.It.isAny()))
        .returns(() => answers.classProcessIsolation ?? false);
    resolver.setup((r) => r.providedData(typemoq.It.isAny())).returns(() => answers.providedData ?? { kind: 'none' });
    resolver.setup((r) => r.groups(typemoq.It.isAny())).returns(() => new Set(answers.groups ?? []));
    return resolver;
}

export function dataSetOf(...entries: [string | number, unknown[]][]): ProvidedDataResult {
    return { kind: 'data', dataSet: new Map(entries) };
}
