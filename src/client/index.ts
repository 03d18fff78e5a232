// Copyright (c) Microsoft Corporation. All rights reserved.
// Licensed under the MIT License.

'use strict';

// reflect-metadata is needed by inversify, this must come before any inversify references.
import 'reflect-metadata';

import { createServiceContainer } from './ioc/container';
import { registerTypes } from './testing/builder/serviceRegistry';
import { ITestClassRegistry, TestClassDefinition } from './testing/builder/testClassRegistry';
import { Test } from './testing/builder/test';
import { ITestBuilder, ITestMetadataResolver } from './testing/builder/types';

export { IncompleteTestError } from './common/errors/incompleteTestError';
export { NoValidTestError } from './common/errors/noValidTestError';
export { SkippedTestError } from './common/errors/skippedTestError';
export { addLogTransport, getLogLevel, LogLevel, setLogLevel } from './logging';
export * from './testing/builder';

export interface ITestBuilderApi {
    readonly registry: ITestClassRegistry;
    readonly resolver: ITestMetadataResolver;
    readonly builder: ITestBuilder;
    register(definition: TestClassDefinition): void;
    /**
     * Build the tests for a registered class' method.
     */
    build(className: string, methodName: string): Test;
}

export function createTestBuilder(): ITestBuilderApi {
    const { serviceManager, serviceContainer } = createServiceContainer();
    registerTypes(serviceManager);

    const registry = serviceContainer.get<ITestClassRegistry>(ITestClassRegistry);
    const resolver = serviceContainer.get<ITestMetadataResolver>(ITestMetadataResolver);
    const builder = serviceContainer.get<ITestBuilder>(ITestBuilder);
    return {
        registry,
        resolver,
        builder,
        register: (definition) => {
            registry.register(definition);
        },
        build: (className, methodName) => {
            const descriptor = registry.get(className);
            if (!descriptor) {
                throw new Error(`Test class "${className}" is not registered.`);
            }
            return builder.build(descriptor, methodName);
        }
    };
}
