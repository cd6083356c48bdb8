import type { AppConfig } from '../lib/config.js';
import type { Logger } from '../lib/logger.js';
import type { LibraryStore } from '../store/library-store.js';
import { IntakeService } from './intake.service.js';
import { LibrariesService } from './libraries.service.js';
import { RebalanceService } from './rebalance.service.js';
import { SeedService } from './seed.service.js';

export interface Services {
  libraries: LibrariesService;
  rebalance: RebalanceService;
  intake: IntakeService;
  seed: SeedService;
}

export function createServices(store: LibraryStore, config: AppConfig, logger: Logger): Services {
  return {
    libraries: new LibrariesService(store),
    rebalance: new RebalanceService(store, config, logger.child({ service: 'rebalance' })),
    intake: new IntakeService(store, config, logger.child({ service: 'intake' })),
    seed: new SeedService(store, logger.child({ service: 'seed' })),
  };
}
