import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Role } from '../access/roles';
import { ValidationError } from '../errors';
import { NotificationLog } from '../notifications/notification-log';
import { NotificationType } from '../notifications/types';
import { MetricsCollector } from '../scaling/metrics';
import { LogEntry, StructuredLogger } from '../scaling/structured-logger';
import { ADMIN, createTestPlatform, silentLogger } from '../testing/test-platform';
import { ManualClock } from './clock';
import { CommitSequencer } from './commit-sequencer';
import { StateJournal } from './journal';

function setup() {
  const notifications = new NotificationLog({ logger: silentLogger() });
  const metrics = new MetricsCollector();
  const entries: LogEntry[] = [];
  const logger = new StructuredLogger({ sink: (entry) => entries.push(entry) });
  const sequencer = new CommitSequencer({ clock: new ManualClock(500), notifications, logger, metrics });
  return { notifications, metrics, entries, sequencer };
}

const granted = {
  type: NotificationType.ROLE_GRANTED,
  payload: { role: Role.ADMIN, account: 'a', sender: 'a' },
} as const;

describe('StateJournal', () => {
  it('reverses writes newest first on rollback', () => {
    const map = new Map<string, number>([['kept', 1]]);
    const set = new Set<string>(['x']);
    const list = [1, 2];
    const record = { count: 3 };
    const tx = new StateJournal('test');

    tx.put(map, 'kept', 2);
    tx.put(map, 'kept', 3);
    tx.put(map, 'added', 9);
    tx.remove(map, 'missing');
    tx.add(set, 'y');
    tx.discard(set, 'x');
    tx.append(list, 3);
    tx.assign(record, 'count', 4);
    tx.rollback();

    expect(Array.from(map)).toEqual([['kept', 1]]);
    expect(Array.from(set)).toEqual(['x']);
    expect(list).toEqual([1, 2]);
    expect(record.count).toBe(3);
  });

  it('refuses writes once closed', () => {
    const tx = new StateJournal('test');
    expect(tx.commit()).toEqual([]);
    expect(() => tx.put(new Map<string, number>(), 'k', 1)).toThrow('Journal for test is already closed');
  });
});

describe('CommitSequencer', () => {
  it('appends queued notifications after commit at the commit time', () => {
    const { sequencer, notifications, metrics } = setup();

    const result = sequencer.atomically('grant', (tx) => {
      tx.emit(granted);
      expect(notifications.sequence).toBe(0);
      return 'done';
    });

    expect(result).toBe('done');
    expect(notifications.sequence).toBe(1);
    expect(notifications.all()[0].timestamp).toBe(500);
    expect(metrics.counterValue('ledger_operations_total', { operation: 'grant', outcome: 'committed' })).toBe(1);
  });

  it('joins nested calls to the outer transaction', () => {
    const { sequencer, notifications } = setup();
    const map = new Map<string, number>();

    expect(() =>
      sequencer.atomically('outer', (tx) => {
        tx.put(map, 'outer', 1);
        sequencer.atomically('inner', (inner) => {
          expect(inner).toBe(tx);
          inner.put(map, 'inner', 2);
          inner.emit(granted);
        });
        throw new ValidationError('InvalidAmount', 'late failure');
      })
    ).toThrow('late failure');

    expect(map.size).toBe(0);
    expect(notifications.sequence).toBe(0);
    expect(sequencer.inTransaction).toBe(false);
  });

  it('counts aborts by error code and logs unexpected failures', () => {
    const { sequencer, metrics, entries } = setup();

    expect(() =>
      sequencer.atomically('op', () => {
        throw new ValidationError('InvalidAmount', 'bad');
      })
    ).toThrow('bad');
    expect(() =>
      sequencer.atomically('op', () => {
        throw new Error('boom');
      })
    ).toThrow('boom');

    expect(
      metrics.counterValue('ledger_operations_total', { operation: 'op', outcome: 'aborted', code: 'InvalidAmount' })
    ).toBe(1);
    expect(
      metrics.counterValue('ledger_operations_total', { operation: 'op', outcome: 'aborted', code: 'internal' })
    ).toBe(1);
    const errors = entries.filter((entry) => entry.level === 'error');
    expect(errors).toHaveLength(1);
    expect(errors[0].message).toBe('Operation failed unexpectedly');
    expect(errors[0].error).toBe('boom');
  });

  it('rolls back an operation whose notifications cannot be encoded', () => {
    const { sequencer, notifications, metrics } = setup();
    const map = new Map<string, number>();

    expect(() =>
      sequencer.atomically('addParticipant', (tx) => {
        tx.put(map, 'E', 1);
        tx.emit({ type: NotificationType.PARTICIPANT_ADDED, payload: { eventId: 'E', currentParticipants: 1.5 } });
      })
    ).toThrow('Only safe integers can be encoded, got 1.5');

    expect(map.size).toBe(0);
    expect(notifications.sequence).toBe(0);
    expect(sequencer.inTransaction).toBe(false);
    expect(
      metrics.counterValue('ledger_operations_total', {
        operation: 'addParticipant',
        outcome: 'aborted',
        code: 'internal',
      })
    ).toBe(1);
  });

  it('rolls back an operation whose notifications cannot be written', () => {
    const dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'commit-sequencer-'));
    try {
      const { platform } = createTestPlatform({ dataDir });
      const seen: number[] = [];
      platform.notifications.subscribe((n) => seen.push(n.sequence));

      const logFile = path.join(dataDir, 'notifications.jsonl');
      fs.rmSync(logFile);
      fs.mkdirSync(logFile);

      expect(() => platform.value.credit(ADMIN, 'buyer', 10n)).toThrow('EISDIR');

      expect(platform.value.balanceOf('buyer')).toBe(0n);
      expect(platform.notifications.sequence).toBe(4);
      expect(seen).toEqual([]);
    } finally {
      fs.rmSync(dataDir, { recursive: true, force: true });
    }
  });
});
