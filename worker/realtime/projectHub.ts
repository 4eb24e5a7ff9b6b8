import { createLogger } from '../services/logService';
import type { OutlineEvent, OutlineEventSink } from '../services/types';

const log = createLogger('hub');

export type OutlineSubscriber = {
  id: string;
  send: (event: OutlineEvent) => Promise<void> | void;
  /** Called once when the hub gives up on this subscriber. */
  onDrop?: (reason: DropReason) => void;
};

export type DropReason = 'backlog' | 'failed';

export type ProjectHubOptions = {
  /** Events a subscriber may have waiting before it is dropped. */
  maxBacklog?: number;
};

export type ProjectHub = OutlineEventSink & {
  /** Joins the project's group; the returned function leaves it. */
  subscribe: (projectId: string, subscriber: OutlineSubscriber) => () => void;
  subscriberCount: (projectId: string) => number;
};

type Member = {
  subscriber: OutlineSubscriber;
  outbox: OutlineEvent[];
  draining: boolean;
  closed: boolean;
};

/**
 * Per-project subscriber groups. `publish` only queues; each member drains its
 * own outbox, so a stalled reader never holds up the publisher or its peers.
 */
export const createProjectHub = ({ maxBacklog = 100 }: ProjectHubOptions = {}): ProjectHub => {
  const groups = new Map<string, Map<string, Member>>();

  const leave = (projectId: string, member: Member) => {
    member.closed = true;
    member.outbox.length = 0;
    const group = groups.get(projectId);
    if (group?.get(member.subscriber.id) !== member) return;
    group.delete(member.subscriber.id);
    if (group.size === 0) groups.delete(projectId);
  };

  const drop = (projectId: string, member: Member, reason: DropReason, error?: unknown) => {
    if (member.closed) return;
    log.warn('dropping subscriber', { projectId, subscriberId: member.subscriber.id, reason, error });
    leave(projectId, member);
    member.subscriber.onDrop?.(reason);
  };

  const drain = async (projectId: string, member: Member) => {
    member.draining = true;
    try {
      for (let event = member.outbox.shift(); event && !member.closed; event = member.outbox.shift()) {
        await member.subscriber.send(event);
      }
    } catch (error) {
      drop(projectId, member, 'failed', error);
    } finally {
      member.draining = false;
    }
  };

  const subscribe = (projectId: string, subscriber: OutlineSubscriber) => {
    let group = groups.get(projectId);
    if (!group) {
      group = new Map();
      groups.set(projectId, group);
    }
    const previous = group.get(subscriber.id);
    if (previous) previous.closed = true;
    const member: Member = { subscriber, outbox: [], draining: false, closed: false };
    group.set(subscriber.id, member);
    return () => leave(projectId, member);
  };

  const publish = async (projectId: string, event: OutlineEvent, origin?: string) => {
    const group = groups.get(projectId);
    if (!group) return;
    for (const member of [...group.values()]) {
      if (member.subscriber.id === origin) continue;
      member.outbox.push(event);
      if (member.outbox.length > maxBacklog) {
        drop(projectId, member, 'backlog');
        continue;
      }
      if (!member.draining) {
        drain(projectId, member).catch((error: unknown) => drop(projectId, member, 'failed', error));
      }
    }
  };

  const subscriberCount = (projectId: string) => groups.get(projectId)?.size ?? 0;

  return { subscribe, publish, subscriberCount };
};
