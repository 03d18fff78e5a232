// Copyright (c) Microsoft Corporation. All rights reserved.
// Licensed under the MIT License.

'use strict';

import 'reflect-metadata';
import { Container } from 'inversify';
import { ServiceManager } from './serviceManager';
import { IServiceContainer, IServiceManager } from './types';

export type ServiceContainerBundle = {
    serviceManager: IServiceManager;
    serviceContainer: IServiceContainer;
};

export function createServiceContainer(): ServiceContainerBundle {
    const container = new Container();
    const serviceManager = new ServiceManager(container);
    const serviceContainer: IServiceContainer = serviceManager;
    serviceManager.addSingletonInstance<IServiceManager>(IServiceManager, serviceManager);
    serviceManager.addSingletonInstance<IServiceContainer>(IServiceContainer, serviceContainer);
    return { serviceManager, serviceContainer };
}
