// Copyright (c) Microsoft Corporation. All rights reserved.
// Licensed under the MIT License.

'use strict';

import { interfaces } from 'inversify';

export type ClassType<T> = interfaces.Newable<T>;

export const IServiceManager = Symbol('IServiceManager');

export interface IServiceManager {
    addSingleton<T>(serviceIdentifier: interfaces.ServiceIdentifier<T>, constructor: ClassType<T>): void;
    addSingletonInstance<T>(serviceIdentifier: interfaces.ServiceIdentifier<T>, instance: T): void;
    get<T>(serviceIdentifier: interfaces.ServiceIdentifier<T>): T;
}

export const IServiceContainer = Symbol('IServiceContainer');
export interface IServiceContainer {
    get<T>(serviceIdentifier: interfaces.ServiceIdentifier<T>): T;
}
