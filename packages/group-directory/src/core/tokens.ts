import { Inject } from '@nestjs/common';

export const GROUP_DIRECTORY_MODULE_OPTIONS = Symbol('GROUP_DIRECTORY_MODULE_OPTIONS');

export const GROUP_DIRECTORY_POOLS = Symbol('GROUP_DIRECTORY_POOLS');

export const GROUP_DIRECTORY_DATABASE = Symbol('GROUP_DIRECTORY_DATABASE');

export const GROUP_DIRECTORY_READONLY_DATABASE = Symbol('GROUP_DIRECTORY_READONLY_DATABASE');

export const GROUP_DIRECTORY_METRICS = Symbol('GROUP_DIRECTORY_METRICS');

export const GROUP_DIRECTORY_FACTORY = Symbol('GROUP_DIRECTORY_FACTORY');

export const InjectGroupDirectoryFactory = () => Inject(GROUP_DIRECTORY_FACTORY);
