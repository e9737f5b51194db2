import { describe, expect, it } from 'vitest';
import { ManualClock } from './clock';
import { InvalidArgumentError, NotAuthorizedError } from './errors';
import { createRoomState } from './roomManager';
import { SyncEngine, effectivePosition } from './syncEngine';

const setup = () => {
  const clock = new ManualClock(1_000_000);
  const engine = new SyncEngine(clock);
  const room = createRoomState('R1', clock.now());
  return { clock, engine, room };
};

describe('effectivePosition', () => {
  it('returns the stored position while paused', () => {
    const { clock, room } = setup();
    room.position = 12;
    clock.advance(5000);
    expect(effectivePosition(room, clock.now())).toBe(12);
  });

  it('never decreases while playing and time passes', () => {
    const { clock, engine, room } = setup();
    engine.play(room);

    const samples: number[] = [];
    for (const step of [0, 1000, 1500, 2500]) {
      clock.advance(step);
      samples.push(effectivePosition(room, clock.now()));
    }

    expect(samples).toEqual([0, 1, 2.5, 5]);
  });

  it('ignores timestamps older than the last update', () => {
    const { clock, engine, room } = setup();
    engine.play(room);
    expect(effectivePosition(room, clock.now() - 3000)).toBe(0);
  });
});

describe('SyncEngine', () => {
  it('resets playback when media changes', () => {
    const { clock, engine, room } = setup();
    engine.play(room);
    clock.advance(3000);

    engine.setMedia(room, 'movie2');
    const snapshot = engine.snapshot(room);

    expect(snapshot).toMatchObject({ media_id: 'movie2', position: 0, playing: false });
  });

  it('trims the media id it stores', () => {
    const { engine, room } = setup();
    expect(engine.setMedia(room, ' clip ')).toMatchObject({ media_id: 'clip' });
    expect(room.mediaId).toBe('clip');
  });

  it.each(['   ', 7, undefined])('rejects media id %j', (mediaId) => {
    const { engine, room } = setup();
    expect(() => engine.setMedia(room, mediaId)).toThrow(InvalidArgumentError);
    expect(room.mediaId).toBeNull();
  });

  it('keeps the position when play is sent twice in a row', () => {
    const { engine, room } = setup();

    const first = engine.play(room);
    const second = engine.play(room);

    expect(first.position).toBe(0);
    expect(second.position).toBe(0);
    expect(room.playing).toBe(true);
  });

  it('folds elapsed time into the position on a repeated play', () => {
    const { clock, engine, room } = setup();
    engine.play(room);
    clock.advance(2000);

    const replay = engine.play(room);

    expect(replay).toEqual({ type: 'play', position: 2, timestamp: 1_002_000 });
    clock.advance(1000);
    expect(effectivePosition(room, clock.now())).toBe(3);
  });

  it('freezes the effective position on pause and resumes from it', () => {
    const { clock, engine, room } = setup();
    engine.play(room);
    clock.advance(5000);

    expect(engine.pause(room)).toEqual({ type: 'pause', position: 5 });

    clock.advance(3000);
    expect(engine.snapshot(room).position).toBe(5);

    engine.play(room);
    clock.advance(1000);
    expect(engine.snapshot(room).position).toBe(6);
  });

  it('seeks without touching the playing flag', () => {
    const { clock, engine, room } = setup();
    engine.play(room);
    clock.advance(2000);

    expect(engine.seek(room, 30)).toEqual({ type: 'seek', position: 30, playing: true, timestamp: 1_002_000 });

    clock.advance(1000);
    expect(effectivePosition(room, clock.now())).toBe(31);
  });

  it.each([-1, Number.NaN, Number.POSITIVE_INFINITY, '10', null])('rejects seek to %s', (position) => {
    const { engine, room } = setup();
    room.position = 4;

    expect(() => engine.seek(room, position)).toThrow(InvalidArgumentError);
    expect(room.position).toBe(4);
  });

  it('gives the host role to the first joiner who asks for it', () => {
    const { engine, room } = setup();

    expect(engine.join(room, 'A', 'alice', { wantHost: false }).role).toBe('member');
    expect(engine.join(room, 'B', 'bob', { wantHost: true }).role).toBe('host');
    expect(engine.join(room, 'C', 'carol', { wantHost: true }).role).toBe('member');
    expect(room.hostId).toBe('B');
  });

  it('seeds media only into a room that has none', () => {
    const { engine, room } = setup();

    engine.join(room, 'A', 'alice', { wantHost: false, mediaId: 'm1' });
    engine.join(room, 'B', 'bob', { wantHost: true, mediaId: 'm2' });

    expect(room.mediaId).toBe('m1');
  });

  it('builds the join snapshot and announcement', () => {
    const { engine, room } = setup();
    engine.join(room, 'A', 'alice', { wantHost: true, mediaId: 'movie1' });

    const result = engine.join(room, 'B', 'bob', { wantHost: false });

    expect(result.snapshot).toEqual({
      type: 'state',
      media_id: 'movie1',
      position: 0,
      playing: false,
      host_id: 'A',
      members: [
        { id: 'A', name: 'alice', role: 'host' },
        { id: 'B', name: 'bob', role: 'member' },
      ],
      server_ts: 1_000_000,
    });
    expect(result.announcement).toEqual({ type: 'member_joined', id: 'B', name: 'bob' });
  });

  it('clears the host on departure but leaves playback running', () => {
    const { clock, engine, room } = setup();
    engine.join(room, 'A', 'alice', { wantHost: true, mediaId: 'movie1' });
    engine.join(room, 'B', 'bob', { wantHost: false });
    engine.play(room);
    clock.advance(4000);

    const result = engine.leave(room, 'A');

    expect(result.hostCleared).toBe(true);
    expect(result.member?.name).toBe('alice');
    expect(engine.snapshot(room)).toMatchObject({ host_id: null, playing: true, position: 4, media_id: 'movie1' });
  });

  it('lets a member claim a vacant host role only', () => {
    const { engine, room } = setup();
    engine.join(room, 'A', 'alice', { wantHost: true });
    engine.join(room, 'B', 'bob', { wantHost: false });

    expect(engine.claimHost(room, 'B')).toBe(false);
    engine.leave(room, 'A');
    expect(engine.claimHost(room, 'B')).toBe(true);
    expect(engine.claimHost(room, 'stranger')).toBe(false);
    expect(room.hostId).toBe('B');
  });

  it('only accepts commands from the host', () => {
    const { engine, room } = setup();
    engine.join(room, 'A', 'alice', { wantHost: true });

    expect(() => engine.requireHost(room, 'A')).not.toThrow();
    expect(() => engine.requireHost(room, 'B')).toThrow(NotAuthorizedError);
  });
});
