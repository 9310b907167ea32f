import { describe, it, expect } from 'vitest';
import { InMemoryTaskRepository } from './memory.js';
import { describeTaskRepositoryContract, taskData } from '../test-support/task-repository-contract.js';

describeTaskRepositoryContract('InMemoryTaskRepository', () => new InMemoryTaskRepository());

describe('InMemoryTaskRepository', () => {
  it('should hand out copies so callers cannot mutate stored tasks', async () => {
    const repo = new InMemoryTaskRepository();
    const task = await repo.create(taskData());

    task.status = 'completed';
    task.videoTitle = 'changed';

    const stored = await repo.get(task.id);
    expect(stored?.status).toBe('pending');
    expect(stored?.videoTitle).toBe('Morning headlines');
  });

  it('should report its kind', () => {
    expect(new InMemoryTaskRepository().kind).toBe('memory');
  });
});
