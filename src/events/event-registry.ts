/**
 * Event Registry
 *
 * Time-windowed events with an optional participant cap. Only
 * EventManagers write here; no signatures are involved. Reward metadata
 * lives in a side table so the hot config stays small.
 */

import { AccessControlRegistry } from '../access/access-control';
import { Role } from '../access/roles';
import { CapacityError, StateError, ValidationError } from '../errors';
import { Notification, NotificationType } from '../notifications/types';
import { StructuredLogger } from '../scaling/structured-logger';
import { CommitSequencer } from '../state/commit-sequencer';
import { Restorable } from '../state/state-builder';

export const MAX_REWARD_TIER = 5;

export interface EventConfig {
  id: string;
  name: string;
  startTime: number;
  endTime: number;
  /** 0 means unbounded */
  maxParticipants: number;
  currentParticipants: number;
  active: boolean;
}

export interface RewardConfig {
  /** 0 = no achievement, 1..5 otherwise */
  achievementTier: number;
  cosmeticItemIds: string[];
  xpBonus: number;
  hasReward: boolean;
}

export interface CreateEventInput {
  id: string;
  name: string;
  startTime: number;
  endTime: number;
  maxParticipants: number;
  reward?: RewardConfig;
}

export interface UpdateEventInput {
  name: string;
  startTime: number;
  endTime: number;
  maxParticipants: number;
  active: boolean;
}

export interface EventRegistryDeps {
  sequencer: CommitSequencer;
  access: AccessControlRegistry;
  logger: StructuredLogger;
}

function requireCount(value: number, field: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new ValidationError('InvalidCapacity', `${field} must be a non-negative integer`, { field, value });
  }
}

function validateWindow(startTime: number, endTime: number): void {
  if (!Number.isSafeInteger(startTime) || !Number.isSafeInteger(endTime) || startTime >= endTime) {
    throw new ValidationError('InvalidTimeWindow', 'startTime must be before endTime', { startTime, endTime });
  }
}

function validateReward(reward: RewardConfig): RewardConfig {
  const tier = reward.achievementTier;
  if (!Number.isSafeInteger(tier) || tier < 0 || tier > MAX_REWARD_TIER) {
    throw new ValidationError('InvalidRewardTier', `Reward tier must be between 0 and ${MAX_REWARD_TIER}`, { tier });
  }
  requireCount(reward.xpBonus, 'xpBonus');
  if (!Array.isArray(reward.cosmeticItemIds) || reward.cosmeticItemIds.some((id) => typeof id !== 'string')) {
    throw new ValidationError('InvalidIdentifier', 'cosmeticItemIds must be a list of item ids');
  }
  return {
    achievementTier: tier,
    cosmeticItemIds: [...reward.cosmeticItemIds],
    xpBonus: reward.xpBonus,
    hasReward: reward.hasReward,
  };
}

export class EventRegistry implements Restorable {
  private readonly events = new Map<string, EventConfig>();
  private readonly rewards = new Map<string, RewardConfig>();

  constructor(private readonly deps: EventRegistryDeps) {}

  restore(notification: Notification): void {
    switch (notification.type) {
      case NotificationType.EVENT_CREATED: {
        const { eventId, name, startTime, endTime, maxParticipants, active } = notification.payload;
        this.events.set(eventId, {
          id: eventId,
          name,
          startTime,
          endTime,
          maxParticipants,
          currentParticipants: 0,
          active,
        });
        break;
      }

      case NotificationType.EVENT_UPDATED: {
        const { eventId, name, startTime, endTime, maxParticipants, active } = notification.payload;
        const current = this.requireEvent(eventId);
        this.events.set(eventId, { ...current, name, startTime, endTime, maxParticipants, active });
        break;
      }

      case NotificationType.EVENT_REWARD_SET: {
        const { eventId, achievementTier, cosmeticItemIds, xpBonus, hasReward } = notification.payload;
        this.rewards.set(eventId, { achievementTier, cosmeticItemIds: [...cosmeticItemIds], xpBonus, hasReward });
        break;
      }

      case NotificationType.PARTICIPANT_ADDED: {
        const { eventId, currentParticipants } = notification.payload;
        this.events.set(eventId, { ...this.requireEvent(eventId), currentParticipants });
        break;
      }
    }
  }

  createEvent(caller: string, input: CreateEventInput): EventConfig {
    return this.deps.sequencer.atomically('createEvent', (tx) => {
      this.deps.access.requireRole(Role.EVENT_MANAGER, caller, 'NotEventManager');

      if (typeof input.id !== 'string' || input.id.length === 0) {
        throw new ValidationError('InvalidIdentifier', 'Event id must be a non-empty string');
      }
      if (this.events.has(input.id)) {
        throw new StateError('EventAlreadyExists', `Event ${input.id} already exists`, { eventId: input.id });
      }
      validateWindow(input.startTime, input.endTime);
      requireCount(input.maxParticipants, 'maxParticipants');
      const reward = input.reward ? validateReward(input.reward) : undefined;

      const event: EventConfig = {
        id: input.id,
        name: input.name,
        startTime: input.startTime,
        endTime: input.endTime,
        maxParticipants: input.maxParticipants,
        currentParticipants: 0,
        active: true,
      };

      tx.put(this.events, event.id, event);
      tx.emit({
        type: NotificationType.EVENT_CREATED,
        payload: {
          eventId: event.id,
          name: event.name,
          startTime: event.startTime,
          endTime: event.endTime,
          maxParticipants: event.maxParticipants,
          active: event.active,
          hasReward: reward !== undefined,
        },
      });

      if (reward) {
        tx.put(this.rewards, event.id, reward);
        tx.emit({ type: NotificationType.EVENT_REWARD_SET, payload: { eventId: event.id, ...reward } });
      }

      this.deps.logger.info('events', 'Event created', { eventId: event.id, by: caller });
      return { ...event };
    });
  }

  /**
   * Overwrites name, window, capacity and active flag. The reward and the
   * participant count are left as they are.
   */
  updateEvent(caller: string, id: string, update: UpdateEventInput): EventConfig {
    return this.deps.sequencer.atomically('updateEvent', (tx) => {
      this.deps.access.requireRole(Role.EVENT_MANAGER, caller, 'NotEventManager');
      const current = this.requireEvent(id);

      validateWindow(update.startTime, update.endTime);
      requireCount(update.maxParticipants, 'maxParticipants');
      if (update.maxParticipants !== 0 && update.maxParticipants < current.currentParticipants) {
        throw new ValidationError('InvalidCapacity', 'Capacity is below the current participant count', {
          maxParticipants: update.maxParticipants,
          currentParticipants: current.currentParticipants,
        });
      }

      const event: EventConfig = {
        ...current,
        name: update.name,
        startTime: update.startTime,
        endTime: update.endTime,
        maxParticipants: update.maxParticipants,
        active: update.active,
      };

      tx.put(this.events, id, event);
      tx.emit({
        type: NotificationType.EVENT_UPDATED,
        payload: {
          eventId: id,
          name: event.name,
          startTime: event.startTime,
          endTime: event.endTime,
          maxParticipants: event.maxParticipants,
          active: event.active,
        },
      });
      return { ...event };
    });
  }

  setEventReward(caller: string, id: string, reward: RewardConfig): RewardConfig {
    return this.deps.sequencer.atomically('setEventReward', (tx) => {
      this.deps.access.requireRole(Role.EVENT_MANAGER, caller, 'NotEventManager');
      this.requireEvent(id);

      const stored = validateReward(reward);
      tx.put(this.rewards, id, stored);
      tx.emit({ type: NotificationType.EVENT_REWARD_SET, payload: { eventId: id, ...stored } });
      return { ...stored, cosmeticItemIds: [...stored.cosmeticItemIds] };
    });
  }

  /**
   * Called on behalf of the off-system completion checker, which holds the
   * EventManager role.
   */
  incrementParticipants(caller: string, id: string): number {
    return this.deps.sequencer.atomically('incrementParticipants', (tx) => {
      this.deps.access.requireRole(Role.EVENT_MANAGER, caller, 'NotEventManager');
      const event = this.requireEvent(id);

      if (event.maxParticipants !== 0 && event.currentParticipants >= event.maxParticipants) {
        throw new CapacityError('EventFull', `Event ${id} is full`, {
          eventId: id,
          maxParticipants: event.maxParticipants,
        });
      }

      const currentParticipants = event.currentParticipants + 1;
      tx.put(this.events, id, { ...event, currentParticipants });
      tx.emit({ type: NotificationType.PARTICIPANT_ADDED, payload: { eventId: id, currentParticipants } });
      return currentParticipants;
    });
  }

  isEventActive(id: string): boolean {
    const event = this.events.get(id);
    if (!event || !event.active) return false;

    const now = this.deps.sequencer.now();
    if (now < event.startTime || now > event.endTime) return false;

    return event.maxParticipants === 0 || event.currentParticipants < event.maxParticipants;
  }

  getEvent(id: string): EventConfig | undefined {
    const event = this.events.get(id);
    return event ? { ...event } : undefined;
  }

  getEventReward(id: string): RewardConfig | undefined {
    const reward = this.rewards.get(id);
    return reward ? { ...reward, cosmeticItemIds: [...reward.cosmeticItemIds] } : undefined;
  }

  listEvents(): EventConfig[] {
    return Array.from(this.events.values(), (event) => ({ ...event }));
  }

  private requireEvent(id: string): EventConfig {
    const event = this.events.get(id);
    if (!event) {
      throw new StateError('EventNotFound', `Event ${id} not found`, { eventId: id });
    }
    return event;
  }
}
