import {
  buildWatchCommand,
  isStreaming,
  WATCH_ENABLE,
  WATCH_DISABLE,
  WATCH_JSON,
  WATCH_NMEA,
  WATCH_RAW,
  WATCH_SCALED,
  WATCH_DEVICE,
  WATCH_PPS,
  WATCH_OLDSTYLE,
} from '../../../src/gpsd/watch.js';

describe('watch flags', () => {
  describe('buildWatchCommand', () => {
    it('builds the streaming JSON scaled command', () => {
      expect(buildWatchCommand(WATCH_ENABLE | WATCH_JSON | WATCH_SCALED))
        .toBe('?WATCH={"enable":true,"json":true,"scaled":true}');
    });

    it('builds a bare enable', () => {
      expect(buildWatchCommand(WATCH_ENABLE)).toBe('?WATCH={"enable":true}');
    });

    it('turns members off when disabling', () => {
      expect(buildWatchCommand(WATCH_DISABLE | WATCH_JSON | WATCH_NMEA))
        .toBe('?WATCH={"enable":false,"json":false,"nmea":false}');
    });

    it('keeps raw levels numeric', () => {
      expect(buildWatchCommand(WATCH_ENABLE | WATCH_RAW)).toBe('?WATCH={"enable":true,"raw":2}');
    });

    it('adds the device path only when asked to', () => {
      expect(buildWatchCommand(WATCH_ENABLE | WATCH_JSON | WATCH_DEVICE, '/dev/ttyUSB0'))
        .toBe('?WATCH={"enable":true,"json":true,"device":"/dev/ttyUSB0"}');
      expect(buildWatchCommand(WATCH_ENABLE | WATCH_JSON, '/dev/ttyUSB0'))
        .toBe('?WATCH={"enable":true,"json":true}');
    });

    it('orders pps after the other members', () => {
      expect(buildWatchCommand(WATCH_ENABLE | WATCH_PPS | WATCH_JSON))
        .toBe('?WATCH={"enable":true,"json":true,"pps":true}');
    });

    it('uses the old-style commands', () => {
      expect(buildWatchCommand(WATCH_OLDSTYLE | WATCH_ENABLE)).toBe('w+');
      expect(buildWatchCommand(WATCH_OLDSTYLE | WATCH_DISABLE)).toBe('w-');
    });
  });

  describe('isStreaming', () => {
    it('is true only for enable without disable', () => {
      expect(isStreaming(WATCH_ENABLE | WATCH_JSON)).toBe(true);
      expect(isStreaming(WATCH_DISABLE | WATCH_JSON)).toBe(false);
      expect(isStreaming(WATCH_JSON)).toBe(false);
    });
  });
});
