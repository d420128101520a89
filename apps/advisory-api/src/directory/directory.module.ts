// Import Global and Module decorators
import { Global, Module } from '@nestjs/common';
// Import ConfigService to read the seed path
import { ConfigService } from '@nestjs/config';
// Import validated environment type
import type { AppEnv } from '../config/env.validation';
// Import JSON logger
import { JsonLogger } from '../logging/json-logger.service';
// Import directory token
import { ADVISORY_DIRECTORY } from './advisory-directory';
// Import seed loader
import { loadDirectorySeed } from './directory-seed';
// Import in-memory implementation
import { InMemoryAdvisoryDirectory } from './in-memory-directory';

/**
 * Build the directory from DIRECTORY_SEED_PATH, or an empty one when unset
 * Seed errors reject, which aborts application startup
 * @param config - Validated configuration
 */
export async function createAdvisoryDirectory(config: ConfigService<AppEnv, true>): Promise<InMemoryAdvisoryDirectory> {
  const logger = new JsonLogger('DirectoryModule');
  const seedPath = config.get('DIRECTORY_SEED_PATH', { infer: true });

  if (!seedPath) {
    logger.warn('DIRECTORY_SEED_PATH not set; directory is empty and every request will be denied');
    return new InMemoryAdvisoryDirectory();
  }

  const directory = new InMemoryAdvisoryDirectory(await loadDirectorySeed(seedPath));
  logger.log('Directory loaded', { seedPath, ...directory.stats() });
  return directory;
}

/**
 * DirectoryModule - Provides the AdvisoryDirectory globally
 * Marked @Global so principal and resource resolution can inject it without re-importing
 */
@Global()
@Module({
  providers: [
    {
      provide: ADVISORY_DIRECTORY,
      inject: [ConfigService],
      useFactory: createAdvisoryDirectory
    }
  ],
  exports: [ADVISORY_DIRECTORY]
})
export class DirectoryModule {}
