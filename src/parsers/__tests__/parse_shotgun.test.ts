import { describe, expect, it } from 'vitest';
import { parseAmount, parseCount, parseShotgunCard, parseShotgunCards } from '../parse_shotgun';

const provenance = {
  runId: 'run-1',
  scrapeTimestampUtc: '2025-09-01T08:00:00.000Z',
  sourceUrl: 'https://smartboard.shotgun.live/events',
};
const reference = new Date(Date.UTC(2025, 8, 1));

describe('parseShotgunCard', () => {
  it('reads a full dashboard card', () => {
    const record = parseShotgunCard(
      {
        href: '/events/abc123',
        title: 'Daft Punk @ Accor Arena',
        lines: ['Daft Punk @ Accor Arena', '10/10/2025 20h30', 'Accor Arena · Paris', '245 / 500 billets vendus', '12 345,50 €', '49 %'],
      },
      provenance,
      reference,
    );
    expect(record).toEqual({
      sourceId: 'abc123',
      displayName: 'Daft Punk @ Accor Arena',
      artistName: null,
      venueName: 'Accor Arena',
      city: 'Paris',
      country: null,
      eventTime: '2025-10-10T20:30',
      ticketsSold: 245,
      grossAmount: 12345.5,
      currency: 'EUR',
      sellThroughPct: 49,
      status: 'on_sale',
      sourceUrl: 'https://smartboard.shotgun.live/events/abc123',
      scrapeTimestampUtc: '2025-09-01T08:00:00.000Z',
      runId: 'run-1',
      extra: { capacity: 500 },
    });
  });

  it('handles written dates, status keywords and cards without a link', () => {
    const card = { href: null, title: 'Soirée Techno', lines: ['vendredi 10 octobre 2025', 'COMPLET', '300 tickets sold'] };
    const record = parseShotgunCard(card, provenance, reference);
    expect(record).toMatchObject({
      eventTime: '2025-10-10',
      ticketsSold: 300,
      sellThroughPct: null,
      status: 'sold_out',
      venueName: null,
      sourceUrl: 'https://smartboard.shotgun.live/events',
      extra: { capacity: null },
    });
    expect(record?.sourceId).toMatch(/^sg-[0-9a-f]{12}$/);
    expect(parseShotgunCard(card, provenance, reference)?.sourceId).toBe(record?.sourceId);
  });

  it('derives the sell-through from sold and capacity', () => {
    const record = parseShotgunCard({ href: null, title: 'Show', lines: ['150/400'] }, provenance, reference);
    expect(record).toMatchObject({ ticketsSold: 150, sellThroughPct: 37.5, extra: { capacity: 400 } });
  });

  it('reads a bare count followed by the sold keyword', () => {
    const french = parseShotgunCard({ href: null, title: 'Show', lines: ['10/10/2025', '120 vendus'] }, provenance, reference);
    expect(french).toMatchObject({ eventTime: '2025-10-10', ticketsSold: 120, extra: { capacity: null } });
    const english = parseShotgunCard({ href: null, title: 'Show', lines: ['1,250 sold'] }, provenance, reference);
    expect(english?.ticketsSold).toBe(1250);
    const labelled = parseShotgunCard({ href: null, title: 'Show', lines: ['Vendus : 75'] }, provenance, reference);
    expect(labelled?.ticketsSold).toBe(75);
  });

  it('recognises cancelled and postponed events', () => {
    expect(parseShotgunCard({ href: null, title: 'Band', lines: ['Annulé'] }, provenance)?.status).toBe('canceled');
    expect(parseShotgunCard({ href: null, title: 'Band', lines: ['Reporté'] }, provenance)?.status).toBe('postponed');
    expect(parseShotgunCard({ href: null, title: 'Band (postponed)', lines: [] }, provenance)?.status).toBe('postponed');
  });

  it('drops cards without a title', () => {
    expect(parseShotgunCards([{ href: '/events/1', title: '  ', lines: ['x'] }], provenance)).toEqual([]);
  });
});

describe('number parsing', () => {
  it('reads counts with any thousands separator', () => {
    expect(parseCount('1 200')).toBe(1200);
    expect(parseCount('1.200')).toBe(1200);
    expect(parseCount('abc')).toBeNull();
  });

  it('reads French and English amounts', () => {
    expect(parseAmount('1 234,50')).toBe(1234.5);
    expect(parseAmount('1,234.50')).toBe(1234.5);
    expect(parseAmount('1.234')).toBe(1234);
    expect(parseAmount('980')).toBe(980);
    expect(parseAmount('')).toBeNull();
  });
});
