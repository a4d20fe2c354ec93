import { SandboxBusyError } from '../../src/sandbox/ErrorHandling.js';
import { SandboxLocks } from '../../src/sandbox/SandboxLocks.js';

describe('SandboxLocks', () => {
  let locks: SandboxLocks;

  beforeEach(() => {
    locks = new SandboxLocks();
  });

  describe('acquireExecution', () => {
    it('should fail fast when an execution already holds the sandbox', () => {
      locks.acquireExecution('u1', 'run');

      expect(() => locks.acquireExecution('u1', 'install')).toThrow(SandboxBusyError);
      expect(() => locks.acquireExecution('u1', 'run')).toThrow(
        'Sandbox for user u1 is busy (run in progress)',
      );
    });

    it('should not block other users', () => {
      locks.acquireExecution('u1', 'run');

      expect(() => locks.acquireExecution('u2', 'run')).not.toThrow();
    });

    it('should allow a new execution after release', () => {
      const release = locks.acquireExecution('u1', 'run');
      release();

      expect(() => locks.acquireExecution('u1', 'install')).not.toThrow();
      expect(locks.heldBy('u1')).toBe('install');
    });

    it('should ignore repeated releases', () => {
      const first = locks.acquireExecution('u1', 'run');
      first();
      locks.acquireExecution('u1', 'install');
      first();

      expect(locks.heldBy('u1')).toBe('install');
    });

    it('should never report more than one active execution', () => {
      const observed: number[] = [];
      for (let i = 0; i < 10; i++) {
        try {
          locks.acquireExecution('u1', i % 2 === 0 ? 'run' : 'install');
        } catch (error) {
          expect(error).toBeInstanceOf(SandboxBusyError);
        }
        observed.push(locks.activeExecutions('u1'));
      }

      expect(Math.max(...observed)).toBe(1);
    });

    it('should mark busy errors as retryable', () => {
      locks.acquireExecution('u1', 'run');
      try {
        locks.acquireExecution('u1', 'run');
        throw new Error('expected busy error');
      } catch (error) {
        expect(error).toBeInstanceOf(SandboxBusyError);
        expect(error).toMatchObject({ code: 'SANDBOX_BUSY', retryable: true });
      }
    });
  });

  describe('acquireDelete', () => {
    it('should fail while an execution runs', () => {
      locks.acquireExecution('u1', 'run');

      expect(() => locks.acquireDelete('u1')).toThrow(SandboxBusyError);
    });

    it('should fail while a file operation is in flight', () => {
      const release = locks.acquireShared('u1');

      expect(() => locks.acquireDelete('u1')).toThrow(
        'Sandbox for user u1 is busy (file operation in progress)',
      );
      release();
      expect(() => locks.acquireDelete('u1')).not.toThrow();
    });

    it('should exclude executions and file operations while held', () => {
      locks.acquireDelete('u1');

      expect(() => locks.acquireExecution('u1', 'run')).toThrow(SandboxBusyError);
      expect(() => locks.acquireShared('u1')).toThrow(SandboxBusyError);
    });
  });

  describe('acquireShared', () => {
    it('should not exclude other file operations', () => {
      locks.acquireShared('u1');

      expect(() => locks.acquireShared('u1')).not.toThrow();
    });

    it('should fail while an execution runs', () => {
      const release = locks.acquireExecution('u1', 'install');

      expect(() => locks.acquireShared('u1')).toThrow(
        'Sandbox for user u1 is busy (install in progress)',
      );
      release();
      expect(() => locks.acquireShared('u1')).not.toThrow();
    });

    it('should keep executions out while a file operation is in flight', () => {
      const release = locks.acquireShared('u1');

      expect(() => locks.acquireExecution('u1', 'run')).toThrow(
        'Sandbox for user u1 is busy (file operation in progress)',
      );
      release();
      expect(() => locks.acquireExecution('u1', 'run')).not.toThrow();
    });
  });

  describe('forget', () => {
    it('should drop the lock entry', () => {
      locks.acquireShared('u1');
      locks.acquireExecution('u2', 'run');
      expect(locks.size).toBe(2);

      locks.forget('u1');

      expect(locks.size).toBe(1);
      expect(locks.heldBy('u1')).toBeNull();
    });
  });
});
