import { describe, it, expect, beforeEach } from 'vitest';
import { InvalidTransitionError, ValidationError } from '../errors.js';
import { TaskRepository } from '../repositories/base.js';
import { CreateTaskData } from '../types/task.js';

export function taskData(overrides: Partial<CreateTaskData> = {}): CreateTaskData {
  return {
    userId: 'u1',
    sourceId: 'cnn10',
    videoId: 'vid-1',
    videoUrl: 'https://videos.example.test/watch?v=vid-1',
    videoTitle: 'Morning headlines',
    processingMode: 'with_subtitle',
    ...overrides,
  };
}

/** Behaviour every TaskRepository implementation must share. */
export function describeTaskRepositoryContract(name: string, makeRepo: () => TaskRepository) {
  describe(`${name} (contract)`, () => {
    let repo: TaskRepository;

    beforeEach(() => {
      repo = makeRepo();
    });

    describe('create', () => {
      it('should create a pending task with defaults', async () => {
        const task = await repo.create(taskData({ metadata: { format: '480p' } }));

        expect(task.id).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/);
        expect(task.status).toBe('pending');
        expect(task.progress).toBe(0);
        expect(task.completedAt).toBeNull();
        expect(task.outputFile).toBeNull();
        expect(task.subtitleFile).toBeNull();
        expect(task.errorMessage).toBeNull();
        expect(task.metadata).toEqual({ format: '480p' });
        expect(task.createdAt.getTime()).toBe(task.updatedAt.getTime());
      });

      it('should assign unique ids', async () => {
        const a = await repo.create(taskData());
        const b = await repo.create(taskData());

        expect(a.id).not.toBe(b.id);
      });
    });

    describe('get', () => {
      it('should return null for a missing task', async () => {
        expect(await repo.get('missing')).toBeNull();
      });

      it('should round-trip every field', async () => {
        const created = await repo.create(taskData());

        expect(await repo.get(created.id)).toEqual(created);
      });

      it('should not let changes to returned tasks reach the stored record', async () => {
        const created = await repo.create(taskData({ metadata: { format: '480p', tags: ['news'] } }));
        const fetched = await repo.get(created.id);

        created.metadata.format = 'changed';
        if (fetched) {
          fetched.status = 'completed';
          fetched.metadata.format = 'changed';
          fetched.metadata.tags = [];
        }

        expect(await repo.get(created.id)).toMatchObject({
          status: 'pending',
          metadata: { format: '480p', tags: ['news'] },
        });
      });
    });

    describe('findByUser', () => {
      it('should list newest first and honour the limit', async () => {
        const first = await repo.create(taskData());
        const second = await repo.create(taskData());
        const third = await repo.create(taskData());
        await repo.create(taskData({ userId: 'someone-else' }));

        const tasks = await repo.findByUser('u1', { limit: 2 });

        expect(tasks.map(t => t.id)).toEqual([third.id, second.id]);
        expect(tasks.map(t => t.id)).not.toContain(first.id);
      });

      it('should filter by status', async () => {
        const a = await repo.create(taskData());
        await repo.create(taskData());
        await repo.updatePartial(a.id, { status: 'downloading' });

        const tasks = await repo.findByUser('u1', { status: 'downloading' });

        expect(tasks.map(t => t.id)).toEqual([a.id]);
      });
    });

    describe('updatePartial', () => {
      it('should return null for a missing task', async () => {
        expect(await repo.updatePartial('missing', { progress: 5 })).toBeNull();
      });

      it('should change only the provided fields', async () => {
        const task = await repo.create(taskData());
        await repo.updatePartial(task.id, { status: 'downloading', progress: 10 });

        const updated = await repo.updatePartial(task.id, { progress: 55 });

        expect(updated).toMatchObject({
          status: 'downloading',
          progress: 55,
          outputFile: null,
          subtitleFile: null,
          errorMessage: null,
          completedAt: null,
          videoTitle: 'Morning headlines',
        });
        expect(updated?.updatedAt.getTime()).toBeGreaterThanOrEqual(task.updatedAt.getTime());
      });

      it('should stamp completedAt when reaching a terminal status', async () => {
        const task = await repo.create(taskData());
        await repo.updatePartial(task.id, { status: 'downloading' });
        await repo.updatePartial(task.id, { status: 'processing' });

        const done = await repo.updatePartial(task.id, { status: 'completed', progress: 100, outputFile: '/out.mp4' });

        expect(done?.completedAt).toBeInstanceOf(Date);
        expect(done?.outputFile).toBe('/out.mp4');
      });

      it('should stamp completedAt for failed and cancelled tasks', async () => {
        const failed = await repo.create(taskData());
        const cancelled = await repo.create(taskData());

        expect((await repo.updatePartial(failed.id, { status: 'failed', errorMessage: 'boom' }))?.completedAt).toBeInstanceOf(Date);
        expect((await repo.updatePartial(cancelled.id, { status: 'cancelled' }))?.completedAt).toBeInstanceOf(Date);
      });

      it('should keep progress from moving backwards on an active task', async () => {
        const task = await repo.create(taskData());
        await repo.updatePartial(task.id, { status: 'downloading', progress: 40 });

        const updated = await repo.updatePartial(task.id, { progress: 20 });

        expect(updated?.progress).toBe(40);
      });

      it('should reject out-of-range progress', async () => {
        const task = await repo.create(taskData());

        await expect(repo.updatePartial(task.id, { progress: 101 })).rejects.toBeInstanceOf(ValidationError);
        await expect(repo.updatePartial(task.id, { progress: 2.5 })).rejects.toBeInstanceOf(ValidationError);
      });

      it('should reject transitions out of a terminal status', async () => {
        const task = await repo.create(taskData());
        await repo.updatePartial(task.id, { status: 'cancelled' });

        await expect(repo.updatePartial(task.id, { status: 'downloading' })).rejects.toBeInstanceOf(InvalidTransitionError);
        expect((await repo.get(task.id))?.status).toBe('cancelled');
      });

      it('should reject skipping pipeline stages', async () => {
        const task = await repo.create(taskData());

        await expect(repo.updatePartial(task.id, { status: 'completed' })).rejects.toBeInstanceOf(InvalidTransitionError);
      });

      it('should not lose concurrent updates of the same task', async () => {
        const task = await repo.create(taskData());

        await Promise.all([
          repo.updatePartial(task.id, { status: 'downloading' }),
          repo.updatePartial(task.id, { subtitleFile: '/subs.vtt' }),
          repo.updatePartial(task.id, { metadata: { cacheHit: false } }),
          repo.updatePartial(task.id, { progress: 30 }),
        ]);

        expect(await repo.get(task.id)).toMatchObject({
          status: 'downloading',
          subtitleFile: '/subs.vtt',
          metadata: { cacheHit: false },
          progress: 30,
        });
      });
    });

    describe('transition', () => {
      it('should apply the update when the status matches', async () => {
        const task = await repo.create(taskData());

        const result = await repo.transition(task.id, ['pending'], { status: 'downloading', progress: 10 });

        expect(result.kind).toBe('updated');
        if (result.kind === 'updated') {
          expect(result.task.status).toBe('downloading');
          expect(result.task.progress).toBe(10);
        }
      });

      it('should report a conflict and leave the task untouched otherwise', async () => {
        const task = await repo.create(taskData());
        await repo.updatePartial(task.id, { status: 'cancelled' });

        const result = await repo.transition(task.id, ['processing'], { status: 'completed', progress: 100 });

        expect(result.kind).toBe('conflict');
        const stored = await repo.get(task.id);
        expect(stored?.status).toBe('cancelled');
        expect(stored?.progress).toBe(0);
      });

      it('should report not_found for a missing task', async () => {
        expect(await repo.transition('missing', ['pending'], { status: 'failed' })).toEqual({ kind: 'not_found' });
      });
    });

    describe('delete', () => {
      it('should remove the record and return it', async () => {
        const task = await repo.create(taskData());

        const removed = await repo.delete(task.id);

        expect(removed?.id).toBe(task.id);
        expect(await repo.get(task.id)).toBeNull();
        expect(await repo.findByUser('u1')).toEqual([]);
      });

      it('should return null when nothing was removed', async () => {
        expect(await repo.delete('missing')).toBeNull();
      });
    });

    describe('findCompletedBefore', () => {
      it('should return terminal tasks completed before the cutoff', async () => {
        const done = await repo.create(taskData());
        const failed = await repo.create(taskData());
        const cancelled = await repo.create(taskData());
        const active = await repo.create(taskData());
        await repo.updatePartial(done.id, { status: 'downloading' });
        await repo.updatePartial(done.id, { status: 'processing' });
        await repo.updatePartial(done.id, { status: 'completed' });
        await repo.updatePartial(failed.id, { status: 'failed' });
        await repo.updatePartial(cancelled.id, { status: 'cancelled' });
        await repo.updatePartial(active.id, { status: 'downloading' });

        const future = new Date(Date.now() + 60_000);
        const found = await repo.findCompletedBefore(future, ['completed', 'failed']);

        expect(found.map(t => t.id).sort()).toEqual([done.id, failed.id].sort());
        expect(await repo.findCompletedBefore(new Date(0), ['completed', 'failed'])).toEqual([]);
      });
    });

    describe('countByStatus', () => {
      it('should count tasks in the given statuses', async () => {
        const a = await repo.create(taskData());
        await repo.create(taskData());
        await repo.create(taskData({ userId: 'u2' }));
        await repo.updatePartial(a.id, { status: 'failed' });

        expect(await repo.countByStatus(['pending', 'downloading', 'processing'])).toBe(2);
        expect(await repo.countByStatus(['pending'], 'u1')).toBe(1);
        expect(await repo.countByStatus(['failed'])).toBe(1);
      });
    });

    describe('findByStatus', () => {
      it('should return matching tasks oldest first', async () => {
        const a = await repo.create(taskData());
        const b = await repo.create(taskData());
        await repo.create(taskData());
        await repo.updatePartial(a.id, { status: 'downloading' });
        await repo.updatePartial(b.id, { status: 'downloading' });
        await repo.updatePartial(b.id, { status: 'processing' });

        const found = await repo.findByStatus(['downloading', 'processing']);

        expect(found.map(t => t.id).sort()).toEqual([a.id, b.id].sort());
      });
    });
  });
}
