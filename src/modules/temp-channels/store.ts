/**
 * In-memory table of the temporary channels the bot is tracking.
 *
 * Purpose: single process-scoped owner of descriptors; the engine receives it
 * by injection and is the only writer.
 * Invariants: one entry per channel id; `insert` refuses an id that is
 * already tracked.
 * Gotchas: entries are the live mutable descriptors, not copies; callers
 * outside the engine should use `snapshotDescriptor`.
 */
import type { ChannelDescriptor, DescriptorSnapshot } from "./types";

export class DescriptorStore {
  private readonly entries = new Map<string, ChannelDescriptor>();

  get size(): number {
    return this.entries.size;
  }

  get(id: string): ChannelDescriptor | undefined {
    return this.entries.get(id);
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  /** @returns `false` when a descriptor with the same id already exists. */
  insert(descriptor: ChannelDescriptor): boolean {
    if (this.entries.has(descriptor.id)) return false;
    this.entries.set(descriptor.id, descriptor);
    return true;
  }

  remove(id: string): boolean {
    return this.entries.delete(id);
  }

  values(): ChannelDescriptor[] {
    return [...this.entries.values()];
  }

  byOwner(ownerId: string, guildId?: string): ChannelDescriptor[] {
    return this.values().filter(
      (descriptor) =>
        descriptor.ownerId === ownerId &&
        (guildId === undefined || descriptor.guildId === guildId),
    );
  }

  clear(): void {
    this.entries.clear();
  }
}

export function snapshotDescriptor(descriptor: ChannelDescriptor): DescriptorSnapshot {
  return {
    ...descriptor,
    invitedUsers: [...descriptor.invitedUsers],
  };
}
