import { describe, expect, it } from 'vitest';
import { firstPresent, preferA, resolveArtist, resolveVenue, splitDisplayName } from '../fields';
import { makeRecord } from './helpers';

describe('splitDisplayName', () => {
  it('splits "artist @ venue" and spaced dashes', () => {
    expect(splitDisplayName('Daft Punk @ Accor Arena')).toEqual({ artist: 'Daft Punk', venue: 'Accor Arena' });
    expect(splitDisplayName('Orelsan - Zénith')).toEqual({ artist: 'Orelsan', venue: 'Zénith' });
  });

  it('leaves hyphenated names alone', () => {
    expect(splitDisplayName('Jay-Z')).toEqual({ artist: 'Jay-Z', venue: null });
  });
});

describe('fallback chains', () => {
  it('prefers the explicit artist, then the display name', () => {
    expect(resolveArtist(makeRecord({ sourceId: '1', displayName: 'Whatever', artistName: 'Justice' }))).toBe('Justice');
    expect(resolveArtist(makeRecord({ sourceId: '2', displayName: 'Justice @ Olympia', artistName: '  ' }))).toBe('Justice');
  });

  it('falls back from venue to the display name, then the city', () => {
    expect(resolveVenue(makeRecord({ sourceId: '1', displayName: 'Justice @ Olympia' }))).toBe('Olympia');
    expect(resolveVenue(makeRecord({ sourceId: '2', displayName: 'Justice', city: 'Lyon' }))).toBe('Lyon');
    expect(resolveVenue(makeRecord({ sourceId: '3', displayName: 'Justice' }))).toBeNull();
  });

  it('firstPresent skips blanks', () => {
    expect(firstPresent(null, '', '  ', ' x ')).toBe('x');
    expect(firstPresent(undefined)).toBeNull();
  });
});

describe('preferA', () => {
  it('takes side A and fills gaps from side B', () => {
    const pick = (item: { v: string | null }) => item.v;
    expect(preferA({ v: 'a' }, { v: 'b' }, pick)).toBe('a');
    expect(preferA({ v: null }, { v: 'b' }, pick)).toBe('b');
    expect(preferA(null, { v: 'b' }, pick)).toBe('b');
    expect(preferA(null, null, pick)).toBeNull();
  });
});
