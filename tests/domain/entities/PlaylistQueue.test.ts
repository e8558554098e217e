import { PlaylistQueue } from '../../../src/domain/entities/PlaylistQueue';
import { EmptyQueueError, PlaylistItemError } from '../../../src/domain/errors/BroadcastErrors';

describe('PlaylistQueue Entity', () => {
  let queue: PlaylistQueue;

  beforeEach(() => {
    queue = PlaylistQueue.fromPaths(['/media/intro.mp4', '/media/main.mp4', '/media/outro.mp4']);
  });

  it('should number items in insertion order and title them by file name', () => {
    expect(queue.list()).toEqual([
      { id: 1, position: 1, path: '/media/intro.mp4', title: 'intro.mp4', played: false },
      { id: 2, position: 2, path: '/media/main.mp4', title: 'main.mp4', played: false },
      { id: 3, position: 3, path: '/media/outro.mp4', title: 'outro.mp4', played: false },
    ]);
  });

  it('should advance to the next unplayed item without marking it', () => {
    queue.markPlayed(1);

    expect(queue.advance().id).toBe(2);
    expect(queue.advance().id).toBe(2);
  });

  it('should fail to advance once everything is played', () => {
    [1, 2, 3].forEach((id) => queue.markPlayed(id));

    expect(() => queue.advance()).toThrow(EmptyQueueError);
  });

  it('should only list unplayed paths for a relaunch', () => {
    queue.markPlayed(2);

    expect(queue.unplayedPaths()).toEqual(['/media/intro.mp4', '/media/outro.mp4']);
  });

  it('should only remove unplayed items', () => {
    queue.markPlayed(1);

    expect(() => queue.remove(1)).toThrow('Playlist item 1 was already played and cannot be removed');
    queue.remove(2);
    expect(queue.list().map((item) => item.id)).toEqual([1, 3]);
  });

  it('should reject unknown items', () => {
    expect(() => queue.markPlayed(99)).toThrow(PlaylistItemError);
    expect(() => queue.remove(99)).toThrow('Playlist item 99 not found');
  });

  it('should keep ids increasing after removals', () => {
    queue.remove(3);

    const added = queue.add('/media/encore.mp4', 'Encore');

    expect(added).toEqual({ id: 4, position: 3, path: '/media/encore.mp4', title: 'Encore', played: false });
  });

  it('should clear unplayed items and report how many were dropped', () => {
    queue.markPlayed(1);

    expect(queue.clear()).toBe(2);
    expect(queue.size).toBe(1);
  });

  it('should rewind every played marker', () => {
    [1, 2].forEach((id) => queue.markPlayed(id));

    queue.rewind();

    expect(queue.unplayed()).toHaveLength(3);
  });
});
