import { Injectable, Logger } from '@nestjs/common';
import { CommitListener, Notification } from '../notifications/notification.types';
import { createGenesisState, WorldState } from './world-state';

interface Frame {
  operation: string;
  // Flipped by the first outbound payment; no state write may follow it.
  settling: boolean;
}

/**
 * Hosts the registry's world state and runs every operation against it.
 *
 * An operation is a synchronous function passed to {@link transact}. It holds the
 * thread from start to finish, so no other operation on any property can interleave
 * with it. A throw anywhere inside restores the snapshot taken on entry, including
 * notifications appended so far. Frames nest: a payout receiver may call back into
 * the registry and gets its own frame that rolls back independently.
 *
 * Outbound value leaves through {@link settle}. Once it has been called, the frame
 * rejects further writes and notifications, which keeps every payout after the
 * state and log entries it depends on.
 */
@Injectable()
export class ChainStateService {
  private readonly logger = new Logger(ChainStateService.name);
  private world: WorldState = createGenesisState();
  private readonly frames: Frame[] = [];
  private readonly commitListeners = new Set<CommitListener>();

  transact<T>(operation: string, work: () => T): T {
    const snapshot = structuredClone(this.world);
    this.frames.push({ operation, settling: false });
    try {
      const result = work();
      if (result instanceof Promise) {
        throw new Error(`${operation} must complete synchronously`);
      }
      this.frames.pop();
      if (this.frames.length === 0) {
        this.publish(this.world.notifications.slice(snapshot.notifications.length));
      }
      return result;
    } catch (error) {
      this.frames.pop();
      this.world = snapshot;
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`${operation} aborted: ${message}`);
      throw error;
    }
  }

  read<T>(query: (world: Readonly<WorldState>) => T): T {
    return query(this.world);
  }

  write(mutation: (world: WorldState) => void): void {
    const frame = this.currentFrame('write');
    if (frame.settling) {
      throw new Error(`${frame.operation}: state write after an outbound value transfer`);
    }
    mutation(this.world);
  }

  settle(transfer: (world: WorldState) => void): void {
    const frame = this.currentFrame('settle');
    frame.settling = true;
    transfer(this.world);
  }

  append(notification: Notification): void {
    const frame = this.currentFrame('append');
    if (frame.settling) {
      throw new Error(`${frame.operation}: notification after an outbound value transfer`);
    }
    this.world.notifications.push(notification);
  }

  onCommit(listener: CommitListener): () => void {
    this.commitListeners.add(listener);
    return () => this.commitListeners.delete(listener);
  }

  get inTransaction(): boolean {
    return this.frames.length > 0;
  }

  private currentFrame(action: string): Frame {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) {
      throw new Error(`Cannot ${action} outside of a transaction`);
    }
    return frame;
  }

  private publish(committed: Notification[]): void {
    if (committed.length === 0) {
      return;
    }
    for (const listener of this.commitListeners) {
      try {
        listener(committed);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Commit listener failed after ${committed.length} notifications: ${message}`);
      }
    }
  }
}
