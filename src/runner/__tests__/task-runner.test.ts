/**
 * TaskRunner Unit Tests
 *
 * Covers ordering, idempotence, handler deduplication and chaining, and how
 * check/apply/handler failures end a run.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { TaskRunner } from '../task-runner.js';
import { UnknownHandlerError } from '../errors.js';
import { InMemoryHost } from '../../host/in-memory-host.js';
import { FileContent } from '../../resources/files.js';
import { LoggerStub } from '../../infra/logger.js';
import { RESOURCE_KINDS } from '../../constants/index.js';
import type {
  IAction,
  IApplyResult,
  ICheckResult,
  IHandler,
  IResource,
  ITaskResult,
} from '../../types/index.js';

interface StubBehaviour {
  satisfied?: boolean;
  changed?: boolean;
  failOn?: 'check' | 'apply';
}

function stub(label: string, log: string[], behaviour: StubBehaviour = {}) {
  const check = vi.fn(async (): Promise<ICheckResult> => {
    log.push(`check:${label}`);
    if (behaviour.failOn === 'check') {
      throw new Error(`${label} check broke`);
    }
    return { satisfied: behaviour.satisfied ?? false };
  });
  const apply = vi.fn(async (): Promise<IApplyResult> => {
    log.push(`apply:${label}`);
    if (behaviour.failOn === 'apply') {
      throw new Error(`${label} apply broke`);
    }
    return { changed: behaviour.changed ?? true };
  });
  const resource: IResource = { kind: RESOURCE_KINDS.COMMAND, describe: () => label, check, apply };
  return { resource, check, apply };
}

describe('TaskRunner', () => {
  let host: InMemoryHost;
  let runner: TaskRunner;
  let log: string[];

  beforeEach(() => {
    host = new InMemoryHost('test-host');
    runner = new TaskRunner(host, new LoggerStub());
    log = [];
  });

  describe('Main sequence', () => {
    it('should run actions in declared order and skip apply when already satisfied', async () => {
      const actions: IAction[] = [
        { name: 'first', resource: stub('first', log).resource },
        { name: 'second', resource: stub('second', log, { satisfied: true }).resource },
        { name: 'third', resource: stub('third', log).resource },
      ];

      const result = await runner.execute(actions);

      expect(log).toEqual(['check:first', 'apply:first', 'check:second', 'check:third', 'apply:third']);
      expect(result.results.map((r) => [r.name, r.status])).toEqual([
        ['first', 'changed'],
        ['second', 'unchanged'],
        ['third', 'changed'],
      ]);
      expect(result.host).toBe('test-host');
      expect(result.summary).toMatchObject({ success: true, fatal: false, changed: 2, unchanged: 1, failed: 0 });
    });

    it('should report unchanged when apply ran but changed nothing', async () => {
      const result = await runner.execute([{ name: 'noop', resource: stub('noop', log, { changed: false }).resource }]);

      expect(result.results[0].status).toBe('unchanged');
    });

    it('should be idempotent for a file with content and mode', async () => {
      const actions: IAction[] = [
        { name: 'write x', resource: new FileContent({ path: '/tmp/x', content: 'a', mode: '0644' }) },
      ];

      const first = await runner.execute(actions);
      expect(first.results[0].status).toBe('changed');
      expect(await host.readFile('/tmp/x')).toBe('a');

      const second = await runner.execute(actions);
      expect(second.results[0].status).toBe('unchanged');
      expect(await host.readFile('/tmp/x')).toBe('a');
      expect((await host.stat('/tmp/x'))?.mode).toBe('0644');
    });
  });

  describe('Handlers', () => {
    it('should run a handler notified by three actions exactly once, after all of them', async () => {
      const reload = stub('reload-nginx', log);
      const actions: IAction[] = ['a', 'b', 'c'].map((name) => ({
        name,
        resource: stub(name, log).resource,
        notify: ['reload-nginx'],
      }));

      const result = await runner.execute(actions, [{ name: 'reload-nginx', resource: reload.resource }]);

      expect(reload.apply).toHaveBeenCalledTimes(1);
      expect(log).toEqual([
        'check:a', 'apply:a',
        'check:b', 'apply:b',
        'check:c', 'apply:c',
        'check:reload-nginx', 'apply:reload-nginx',
      ]);
      expect(result.results.filter((r) => r.kind === 'handler')).toHaveLength(1);
      expect(result.results[0].notified).toEqual(['reload-nginx']);
      expect(result.results[1].notified).toEqual([]);
    });

    it('should run handlers in first-notified order', async () => {
      const actions: IAction[] = [
        { name: 'A', resource: stub('A', log).resource, notify: ['validate-config'] },
        { name: 'B', resource: stub('B', log).resource, notify: ['reload-nginx'] },
      ];
      // Registered in the opposite order on purpose
      const handlers: IHandler[] = [
        { name: 'reload-nginx', resource: stub('reload-nginx', log).resource },
        { name: 'validate-config', resource: stub('validate-config', log).resource },
      ];

      const result = await runner.execute(actions, handlers);

      expect(result.results.filter((r) => r.kind === 'handler').map((r) => r.name)).toEqual([
        'validate-config',
        'reload-nginx',
      ]);
    });

    it('should not notify from actions that made no change', async () => {
      const handler = stub('reload-nginx', log);
      const actions: IAction[] = [
        { name: 'A', resource: stub('A', log, { satisfied: true }).resource, notify: ['reload-nginx'] },
      ];

      const result = await runner.execute(actions, [{ name: 'reload-nginx', resource: handler.resource }]);

      expect(handler.check).not.toHaveBeenCalled();
      expect(result.results).toHaveLength(1);
    });

    it('should chain to a second handler only when the first one changed', async () => {
      const restart = stub('restart', log);
      const handlers = (validate: StubBehaviour): IHandler[] => [
        { name: 'validate', resource: stub('validate', log, validate).resource, notify: ['restart'] },
        { name: 'restart', resource: restart.resource },
      ];
      const actions = (): IAction[] => [{ name: 'site', resource: stub('site', log).resource, notify: ['validate'] }];

      const changedRun = await runner.execute(actions(), handlers({ changed: true }));
      expect(changedRun.results.map((r) => r.name)).toEqual(['site', 'validate', 'restart']);
      expect(restart.apply).toHaveBeenCalledTimes(1);

      const unchangedRun = await runner.execute(actions(), handlers({ changed: false }));
      expect(unchangedRun.results.map((r) => r.name)).toEqual(['site', 'validate']);

      const satisfiedRun = await runner.execute(actions(), handlers({ satisfied: true }));
      expect(satisfiedRun.results.map((r) => r.name)).toEqual(['site', 'validate']);
      expect(restart.apply).toHaveBeenCalledTimes(1);
    });

    it('should not run a chained handler twice when it was already notified', async () => {
      const restart = stub('restart', log);
      const actions: IAction[] = [
        { name: 'site', resource: stub('site', log).resource, notify: ['restart', 'validate'] },
      ];
      const handlers: IHandler[] = [
        { name: 'validate', resource: stub('validate', log).resource, notify: ['restart'] },
        { name: 'restart', resource: restart.resource },
      ];

      const result = await runner.execute(actions, handlers);

      expect(restart.apply).toHaveBeenCalledTimes(1);
      expect(result.results.map((r) => r.name)).toEqual(['site', 'restart', 'validate']);
    });

    it('should report an already-satisfied handler as unchanged exactly once', async () => {
      const handler = stub('H', log, { satisfied: true });
      const actions: IAction[] = [
        { name: 'one', resource: stub('one', log).resource, notify: ['H'] },
        { name: 'two', resource: stub('two', log).resource, notify: ['H'] },
      ];

      const result = await runner.execute(actions, [{ name: 'H', resource: handler.resource }]);

      expect(handler.apply).not.toHaveBeenCalled();
      const handlerResults = result.results.filter((r) => r.kind === 'handler');
      expect(handlerResults).toHaveLength(1);
      expect(handlerResults[0]).toMatchObject({ name: 'H', status: 'unchanged' });
    });
  });

  describe('Failures', () => {
    it('should stop the main sequence and skip handlers when an apply fails', async () => {
      const handler = stub('reload', log);
      const stubs = [1, 2, 3, 4, 5].map((n) => stub(`action-${n}`, log, n === 3 ? { failOn: 'apply' } : {}));
      const actions: IAction[] = stubs.map((s, i) => ({
        name: `action-${i + 1}`,
        resource: s.resource,
        notify: ['reload'],
      }));

      const result = await runner.execute(actions, [{ name: 'reload', resource: handler.resource }]);

      expect(stubs[3].check).not.toHaveBeenCalled();
      expect(stubs[4].check).not.toHaveBeenCalled();
      expect(handler.check).not.toHaveBeenCalled();
      expect(result.results.map((r) => r.status)).toEqual(['changed', 'changed', 'failed']);
      expect(result.results[2].error).toBe('action-3 apply broke');
      expect(result.summary).toMatchObject({ success: false, fatal: true, failed: 1 });
      expect(result.summary.reason).toBe('Apply failed for "action-3": action-3 apply broke');
    });

    it('should treat a failing check as fatal', async () => {
      const after = stub('after', log);
      const actions: IAction[] = [
        { name: 'broken', resource: stub('broken', log, { failOn: 'check' }).resource },
        { name: 'after', resource: after.resource },
      ];

      const result = await runner.execute(actions);

      expect(after.check).not.toHaveBeenCalled();
      expect(result.summary.fatal).toBe(true);
      expect(result.summary.reason).toBe('Check failed for "broken": broken check broke');
    });

    it('should keep draining handlers after a handler failure when asked to', async () => {
      const second = stub('second', log);
      const actions: IAction[] = [{ name: 'site', resource: stub('site', log).resource, notify: ['first', 'second'] }];
      const handlers: IHandler[] = [
        { name: 'first', resource: stub('first', log, { failOn: 'apply' }).resource, notify: ['third'] },
        { name: 'second', resource: second.resource },
        { name: 'third', resource: stub('third', log).resource },
      ];

      const result = await runner.execute(actions, handlers, { continueAfterHandlerFailure: true });

      expect(second.apply).toHaveBeenCalledTimes(1);
      expect(result.results.map((r) => [r.name, r.status])).toEqual([
        ['site', 'changed'],
        ['first', 'failed'],
        ['second', 'changed'],
      ]);
      expect(result.summary).toMatchObject({ success: false, fatal: false, failed: 1 });
      expect(result.summary.reason).toBe('Handler "first" failed during apply: first apply broke');
    });

    it('should stop draining at the first handler failure by default', async () => {
      const second = stub('second', log);
      const actions: IAction[] = [{ name: 'site', resource: stub('site', log).resource, notify: ['first', 'second'] }];
      const handlers: IHandler[] = [
        { name: 'first', resource: stub('first', log, { failOn: 'check' }).resource },
        { name: 'second', resource: second.resource },
      ];

      const result = await runner.execute(actions, handlers);

      expect(second.check).not.toHaveBeenCalled();
      expect(result.results.map((r) => r.name)).toEqual(['site', 'first']);
      expect(result.summary.fatal).toBe(false);
    });

    it('should reject notifications to unknown handlers before touching the host', async () => {
      const action = stub('site', log);

      await expect(
        runner.execute([{ name: 'site', resource: action.resource, notify: ['missing'] }])
      ).rejects.toBeInstanceOf(UnknownHandlerError);
      expect(action.check).not.toHaveBeenCalled();
    });
  });

  describe('Options', () => {
    it('should report would-be changes without applying in check mode', async () => {
      const action = stub('site', log);
      const handler = stub('reload', log);

      const result = await runner.execute(
        [{ name: 'site', resource: action.resource, notify: ['reload'] }],
        [{ name: 'reload', resource: handler.resource }],
        { checkMode: true }
      );

      expect(action.apply).not.toHaveBeenCalled();
      expect(handler.apply).not.toHaveBeenCalled();
      expect(result.results.map((r) => [r.name, r.status, r.checkMode])).toEqual([
        ['site', 'changed', true],
        ['reload', 'changed', true],
      ]);
    });

    it('should call onProgress after every task', async () => {
      const seen: Array<[string, number]> = [];
      const onProgress = (result: ITaskResult, completed: number) => {
        seen.push([result.name, completed]);
      };

      const result = await runner.execute(
        [
          { name: 'one', resource: stub('one', log).resource, notify: ['H'] },
          { name: 'two', resource: stub('two', log, { satisfied: true }).resource },
        ],
        [{ name: 'H', resource: stub('H', log).resource }],
        { onProgress, playbook: 'demo' }
      );

      expect(seen).toEqual([['one', 1], ['two', 2], ['H', 3]]);
      expect(result.playbook).toBe('demo');
    });
  });
});
