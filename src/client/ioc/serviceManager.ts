// Copyright (c) Microsoft Corporation. All rights reserved.
// Licensed under the MIT License.

'use strict';

import { Container, interfaces } from 'inversify';
import { ClassType, IServiceManager } from './types';

export class ServiceManager implements IServiceManager {
    constructor(private readonly container: Container) {}

    public addSingleton<T>(serviceIdentifier: interfaces.ServiceIdentifier<T>, constructor: ClassType<T>): void {
        this.container.bind<T>(serviceIdentifier).to(constructor).inSingletonScope();
    }

    public addSingletonInstance<T>(serviceIdentifier: interfaces.ServiceIdentifier<T>, instance: T): void {
        this.container.bind<T>(serviceIdentifier).toConstantValue(instance);
    }

    public get<T>(serviceIdentifier: interfaces.ServiceIdentifier<T>): T {
        return this.container.get<T>(serviceIdentifier);
    }
}
