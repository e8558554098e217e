import * as path from "path";
import {
  EmptyQueueError,
  PlaylistItemError,
} from "../errors/BroadcastErrors";

export interface PlaylistItem {
  readonly id: number;
  readonly position: number;
  readonly path: string;
  readonly title: string;
  readonly played: boolean;
}

export class PlaylistQueue {
  private items: PlaylistItem[] = [];
  private nextId = 1;

  public static fromPaths(paths: readonly string[]): PlaylistQueue {
    const queue = new PlaylistQueue();
    paths.forEach((filePath) => queue.add(filePath));
    return queue;
  }

  public add(filePath: string, title?: string): PlaylistItem {
    const last = this.items[this.items.length - 1];
    const item: PlaylistItem = {
      id: this.nextId++,
      position: last ? last.position + 1 : 1,
      path: filePath,
      title: title ?? path.basename(filePath),
      played: false,
    };
    this.items.push(item);
    return item;
  }

  public remove(id: number): void {
    const item = this.find(id);
    if (item.played) {
      throw new PlaylistItemError(
        `Playlist item ${id} was already played and cannot be removed`
      );
    }
    this.items = this.items.filter((candidate) => candidate.id !== id);
  }

  public list(): PlaylistItem[] {
    return [...this.items];
  }

  /** Next unplayed item in position order. Does not mark it played. */
  public advance(): PlaylistItem {
    const next = this.items.find((item) => !item.played);
    if (!next) {
      throw new EmptyQueueError();
    }
    return next;
  }

  public markPlayed(id: number): PlaylistItem {
    const item = this.find(id);
    const updated: PlaylistItem = { ...item, played: true };
    this.items = this.items.map((candidate) =>
      candidate.id === id ? updated : candidate
    );
    return updated;
  }

  public unplayed(): PlaylistItem[] {
    return this.items.filter((item) => !item.played);
  }

  public unplayedPaths(): string[] {
    return this.unplayed().map((item) => item.path);
  }

  /** Drops every item that has not been delivered yet. */
  public clear(): number {
    const before = this.items.length;
    this.items = this.items.filter((item) => item.played);
    return before - this.items.length;
  }

  /** Clears the played markers so a looping playlist starts over. */
  public rewind(): void {
    this.items = this.items.map((item) => ({ ...item, played: false }));
  }

  public get size(): number {
    return this.items.length;
  }

  private find(id: number): PlaylistItem {
    const item = this.items.find((candidate) => candidate.id === id);
    if (!item) {
      throw new PlaylistItemError(`Playlist item ${id} not found`);
    }
    return item;
  }
}
