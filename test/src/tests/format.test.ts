import { formatFix, formatSession, formatSummary, statusName } from '../../../src/gpsd/format.js';
import { createEmptyFix, summarizeFix } from '../../../src/gpsd/fix.js';

const PARIS = {
  ...createEmptyFix(),
  mode: 3 as const,
  time: '2026-10-19T08:00:02.000Z',
  latitude: 48.85,
  longitude: 2.35,
  altitude: 35.0,
  speed: 0.25,
  track: 90.0,
  climb: 0.0,
};

describe('format', () => {
  describe('formatFix', () => {
    it('renders an acquired fix', () => {
      expect(formatFix(PARIS)).toBe(
        'mode=MODE_3D time=2026-10-19T08:00:02.000Z lat=48.850000 lon=2.350000 alt=35.000000'
      );
    });

    it('renders the unset fix', () => {
      expect(formatFix(createEmptyFix())).toBe(
        'mode=MODE_NO_FIX time=n/a lat=0.000000 lon=0.000000 alt=?'
      );
    });
  });

  describe('formatSummary', () => {
    it('renders the tuple', () => {
      expect(formatSummary(summarizeFix(PARIS))).toBe('(48.85, 2.35, 35, 2026-10-19T08:00:02.000Z)');
    });

    it('renders unset values', () => {
      expect(formatSummary(summarizeFix(createEmptyFix()))).toBe('(0, 0, NaN, n/a)');
    });
  });

  describe('formatSession', () => {
    it('dumps the session state', () => {
      const text = formatSession({
        fix: PARIS,
        utc: '2026-10-19T08:00:02.000Z',
        status: 1,
        satellitesUsed: 1,
        satellites: [
          { PRN: 5, el: 40, az: 120, ss: 32, used: true },
          { PRN: 12, el: 10, az: 300, used: false },
        ],
        dop: { xdop: NaN, ydop: NaN, pdop: 1.6, hdop: 0.9, vdop: 1.25, tdop: 1, gdop: 2 },
      });

      expect(text.split('\n')).toEqual([
        'Time:     2026-10-19T08:00:02.000Z (2026-10-19T08:00:02.000Z)',
        'Lat/Lon:  48.850000 2.350000',
        'Altitude: 35.000000',
        'Speed:    0.250000',
        'Track:    90.000000',
        'Climb:    0.000000',
        'Status:   STATUS_FIX',
        'Mode:     MODE_3D',
        'Quality:  1 p=1.60 h=0.90 v=1.25 t=1.00 g=2.00',
        'Y: 2 satellites in view:',
        '    PRN: 5  E: 40  Az: 120  Ss: 32  Used: y',
        '    PRN: 12  E: 10  Az: 300  Ss: NaN  Used: n',
      ]);
    });

    it('marks unknown values', () => {
      const text = formatSession({
        fix: createEmptyFix(),
        utc: null,
        status: 0,
        satellitesUsed: 0,
        satellites: [],
        dop: { xdop: NaN, ydop: NaN, pdop: NaN, hdop: NaN, vdop: NaN, tdop: NaN, gdop: NaN },
      });

      expect(text.split('\n')).toEqual([
        'Time:     n/a (n/a)',
        'Lat/Lon:  0.000000 0.000000',
        'Altitude: ?',
        'Speed:    ?',
        'Track:    ?',
        'Climb:    ?',
        'Status:   STATUS_NO_FIX',
        'Mode:     MODE_NO_FIX',
        'Quality:  0 p=NaN h=NaN v=NaN t=NaN g=NaN',
        'Y: 0 satellites in view:',
      ]);
    });
  });

  describe('statusName', () => {
    it('falls back to the number for newer status codes', () => {
      expect(statusName(2)).toBe('STATUS_DGPS_FIX');
      expect(statusName(5)).toBe('STATUS_5');
    });
  });
});
