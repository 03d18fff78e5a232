// Copyright (c) Microsoft Corporation. All rights reserved.
// Licensed under the MIT License.

'use strict';

import { inject, injectable } from 'inversify';
import { NoValidTestError } from '../../common/errors/noValidTestError';
import { traceDecorators, traceWarning } from '../../logging';
import { DataProviderTestSuite } from './dataProviderTestSuite';
import { WarningTestCase } from './diagnosticTestCase';
import { applyExecutionPolicy, resolveExecutionPolicy } from './executionPolicy';
import { ExpandableData, getSuiteName, toExpandableData } from './providedData';
import { TestCase } from './testCase';
import type { Test } from './test';
import { ITestBuilder, ITestMetadataResolver } from './types';
import type { ExecutionPolicy, ITestClassDescriptor, TestSpec } from './types';

/**
 * Turns a declared test method into the tests a runner executes: a single case,
 * a suite of data-provided cases, or a diagnostic explaining why neither exists.
 */
@injectable()
export class TestBuilder implements ITestBuilder {
    constructor(@inject(ITestMetadataResolver) private readonly resolver: ITestMetadataResolver) {}

    /**
     * @throws NoValidTestError when the class declares no constructor.
     */
    @traceDecorators.verbose('Build test')
    public build(descriptor: ITestClassDescriptor, methodName: string): Test {
        const className = descriptor.getClassName();

        if (!descriptor.isInstantiable()) {
            const message = `Cannot instantiate class "${className}".`;
            traceWarning(message);
            return new WarningTestCase(message);
        }

        const spec: TestSpec = Object.freeze({ className, methodName });
        const policy = resolveExecutionPolicy(this.resolver, spec);
        const groups = this.resolver.groups(spec);

        const parameterCount = descriptor.constructorParameterCount();
        if (parameterCount === undefined) {
            throw new NoValidTestError();
        }

        // TestCase() or TestCase(name)
        if (parameterCount < 2) {
            return this.buildTestWithoutData(descriptor, methodName, policy);
        }

        // TestCase(name, data, dataName)
        const data = toExpandableData(spec, this.resolver.providedData(spec));
        if (data.kind === 'none') {
            return this.buildTestWithoutData(descriptor, methodName, policy);
        }
        return this.buildDataProviderTestSuite(descriptor, spec, data, policy, groups);
    }

    private buildTestWithoutData(descriptor: ITestClassDescriptor, methodName: string, policy: ExecutionPolicy): TestCase {
        const test = descriptor.instantiate([]);
        test.setName(methodName);
        applyExecutionPolicy(test, policy);
        return test;
    }

    private buildDataProviderTestSuite(
        descriptor: ITestClassDescriptor,
        spec: TestSpec,
        data: Exclude<ExpandableData, { kind: 'none' }>,
        policy: ExecutionPolicy,
        groups: ReadonlySet<string>
    ): DataProviderTestSuite {
        const suite = new DataProviderTestSuite(getSuiteName(spec));

        if (data.kind === 'diagnostic') {
            traceWarning(`${suite.getName()}: ${data.test.getMessage()}`);
            suite.addTest(data.test, groups);
            return suite;
        }

        for (const [dataName, row] of data.dataSet) {
            const test = descriptor.instantiate([spec.methodName, row, dataName]);
            applyExecutionPolicy(test, policy);
            suite.addTest(test, groups);
        }
        return suite;
    }
}
