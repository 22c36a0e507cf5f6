import type { IMenuStorage, TMenuStorageConfig } from '../app.interface';
import { MemoryStorage } from './memory.storage';
import { PostgresStorage } from './postgres.storage';

export const createMenuStorage = (config: TMenuStorageConfig): IMenuStorage => {
    switch (config.driver) {
        case 'memory':
            return new MemoryStorage();
        case 'postgres':
            return new PostgresStorage(config.connection);
        case 'custom':
            return config.instance;
    }
};
