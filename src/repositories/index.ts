import { Settings } from '../config/settings.js';
import { Logger } from '../logger.js';
import { TaskRepository } from './base.js';
import { FileTaskRepository } from './file.js';
import { InMemoryTaskRepository } from './memory.js';
import { RedisTaskRepository } from './redis.js';

export * from './base.js';
export * from './file.js';
export * from './memory.js';
export * from './redis.js';

export function createTaskRepository(repo: Settings['repo'], log: Logger): TaskRepository {
  switch (repo.kind) {
    case 'file':
      return new FileTaskRepository(repo.dataDir, log);

    case 'memory':
      return new InMemoryTaskRepository();

    case 'redis':
      return new RedisTaskRepository(repo.url, repo.token);
  }
}
