import { NotificationType } from '../notifications/types';
import { ADMIN, caught, createTestPlatform, EVENT_MANAGER, HOUR, T0 } from '../testing/test-platform';
import { CreateEventInput } from './event-registry';

function eventInput(overrides: Partial<CreateEventInput> = {}): CreateEventInput {
  return { id: 'E', name: 'Weekend Cup', startTime: T0, endTime: T0 + HOUR, maxParticipants: 2, ...overrides };
}

describe('EventRegistry', () => {
  it('fills an event to capacity and then rejects further participants', () => {
    const { platform } = createTestPlatform();
    platform.events.createEvent(EVENT_MANAGER, eventInput());

    expect(platform.events.incrementParticipants(EVENT_MANAGER, 'E')).toBe(1);
    expect(platform.events.incrementParticipants(EVENT_MANAGER, 'E')).toBe(2);
    expect(caught(() => platform.events.incrementParticipants(EVENT_MANAGER, 'E')).code).toBe('EventFull');
    expect(platform.events.getEvent('E')?.currentParticipants).toBe(2);
    expect(platform.events.isEventActive('E')).toBe(false);
  });

  it('treats zero capacity as unbounded', () => {
    const { platform } = createTestPlatform();
    platform.events.createEvent(EVENT_MANAGER, eventInput({ maxParticipants: 0 }));

    for (let i = 0; i < 5; i++) platform.events.incrementParticipants(EVENT_MANAGER, 'E');
    expect(platform.events.isEventActive('E')).toBe(true);
  });

  it('requires the EventManager role', () => {
    const { platform } = createTestPlatform();

    expect(caught(() => platform.events.createEvent(ADMIN, eventInput())).code).toBe('NotEventManager');
    platform.events.createEvent(EVENT_MANAGER, eventInput());
    expect(caught(() => platform.events.incrementParticipants('someone', 'E')).code).toBe('NotEventManager');
  });

  it('validates ids, windows and reward tiers', () => {
    const { platform } = createTestPlatform();
    platform.events.createEvent(EVENT_MANAGER, eventInput());

    expect(caught(() => platform.events.createEvent(EVENT_MANAGER, eventInput())).code).toBe('EventAlreadyExists');
    expect(caught(() => platform.events.createEvent(EVENT_MANAGER, eventInput({ id: 'F', endTime: T0 }))).code).toBe(
      'InvalidTimeWindow'
    );
    const badReward = { achievementTier: 6, cosmeticItemIds: [], xpBonus: 0, hasReward: true };
    expect(caught(() => platform.events.createEvent(EVENT_MANAGER, eventInput({ id: 'G', reward: badReward }))).code).toBe(
      'InvalidRewardTier'
    );
    expect(platform.events.getEvent('G')).toBeUndefined();
  });

  it('computes activity from the flag, the window and the capacity', () => {
    const { platform, clock } = createTestPlatform();
    platform.events.createEvent(EVENT_MANAGER, eventInput({ startTime: T0 + 10, endTime: T0 + 20 }));

    expect(platform.events.isEventActive('E')).toBe(false);
    clock.set(T0 + 10);
    expect(platform.events.isEventActive('E')).toBe(true);
    clock.set(T0 + 20);
    expect(platform.events.isEventActive('E')).toBe(true);
    clock.set(T0 + 21);
    expect(platform.events.isEventActive('E')).toBe(false);
    expect(platform.events.isEventActive('missing')).toBe(false);
  });

  it('updates configuration without touching reward or participants', () => {
    const { platform } = createTestPlatform();
    const reward = { achievementTier: 2, cosmeticItemIds: ['gold-frame'], xpBonus: 50, hasReward: true };
    platform.events.createEvent(EVENT_MANAGER, eventInput({ reward }));
    platform.events.incrementParticipants(EVENT_MANAGER, 'E');

    const updated = platform.events.updateEvent(EVENT_MANAGER, 'E', {
      name: 'Renamed',
      startTime: T0,
      endTime: T0 + 2 * HOUR,
      maxParticipants: 10,
      active: false,
    });

    expect(updated).toEqual({
      id: 'E',
      name: 'Renamed',
      startTime: T0,
      endTime: T0 + 2 * HOUR,
      maxParticipants: 10,
      currentParticipants: 1,
      active: false,
    });
    expect(platform.events.getEventReward('E')).toEqual(reward);
    expect(platform.events.isEventActive('E')).toBe(false);
  });

  it('refuses to shrink capacity below the current participant count', () => {
    const { platform } = createTestPlatform();
    platform.events.createEvent(EVENT_MANAGER, eventInput({ maxParticipants: 3 }));
    platform.events.incrementParticipants(EVENT_MANAGER, 'E');
    platform.events.incrementParticipants(EVENT_MANAGER, 'E');

    const update = { name: 'x', startTime: T0, endTime: T0 + HOUR, maxParticipants: 1, active: true };
    expect(caught(() => platform.events.updateEvent(EVENT_MANAGER, 'E', update)).code).toBe('InvalidCapacity');
    expect(caught(() => platform.events.updateEvent(EVENT_MANAGER, 'nope', update)).code).toBe('EventNotFound');
  });

  it('emits one notification per transition', () => {
    const { platform } = createTestPlatform();
    const before = platform.notifications.sequence;

    platform.events.createEvent(EVENT_MANAGER, eventInput());
    platform.events.setEventReward(EVENT_MANAGER, 'E', {
      achievementTier: 0,
      cosmeticItemIds: [],
      xpBonus: 10,
      hasReward: true,
    });
    platform.events.incrementParticipants(EVENT_MANAGER, 'E');

    const emitted = platform.notifications.since(before);
    expect(emitted.map((n) => n.type)).toEqual([
      NotificationType.EVENT_CREATED,
      NotificationType.EVENT_REWARD_SET,
      NotificationType.PARTICIPANT_ADDED,
    ]);
    expect(emitted[0].payload).toEqual({
      eventId: 'E',
      name: 'Weekend Cup',
      startTime: T0,
      endTime: T0 + HOUR,
      maxParticipants: 2,
      active: true,
      hasReward: false,
    });
    expect(emitted[2].payload).toEqual({ eventId: 'E', currentParticipants: 1 });
  });
});
