import { Logger } from '@nestjs/common';
import { isValidClusterName, isValidHost, isValidPort, validatePortLayout } from '../config.validators';

describe('isValidHost', () => {
  it('should accept single labels, dotted names and IPv4 addresses', () => {
    expect(isValidHost('coordinator')).toBe(true);
    expect(isValidHost('worker-1')).toBe(true);
    expect(isValidHost('db-a.internal')).toBe(true);
    expect(isValidHost('10.0.0.12')).toBe(true);
  });

  it('should reject empty, malformed and oversized names', () => {
    expect(isValidHost('')).toBe(false);
    expect(isValidHost('-worker')).toBe(false);
    expect(isValidHost('worker-')).toBe(false);
    expect(isValidHost('db_a')).toBe(false);
    expect(isValidHost('db..internal')).toBe(false);
    expect(isValidHost(`${'a'.repeat(63)}.`.repeat(4) + 'com')).toBe(false);
  });
});

describe('isValidPort', () => {
  it('should accept 1 through 65535', () => {
    expect(isValidPort(1)).toBe(true);
    expect(isValidPort(5432)).toBe(true);
    expect(isValidPort(65535)).toBe(true);
  });

  it('should reject out-of-range and fractional ports', () => {
    expect(isValidPort(0)).toBe(false);
    expect(isValidPort(65536)).toBe(false);
    expect(isValidPort(5432.5)).toBe(false);
  });
});

describe('isValidClusterName', () => {
  it('should accept lowercase names with separators', () => {
    expect(isValidClusterName('shardplane')).toBe(true);
    expect(isValidClusterName('analytics_eu-1.prod')).toBe(true);
  });

  it('should reject uppercase, spaces and leading separators', () => {
    expect(isValidClusterName('Analytics')).toBe(false);
    expect(isValidClusterName('my cluster')).toBe(false);
    expect(isValidClusterName('-cluster')).toBe(false);
    expect(isValidClusterName('')).toBe(false);
  });
});

describe('validatePortLayout', () => {
  let warnSpy: jest.SpyInstance;

  beforeEach(() => {
    warnSpy = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it('should stay quiet for the default layout', () => {
    validatePortLayout(5432, 5432, false);

    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('should warn when worker-1 lands on the coordinator port', () => {
    validatePortLayout(5432, 5431, false);

    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith(
      'SHP_PORT_BASE=5431 places worker-1 on the coordinator port 5432. ' +
        'The topology will be rejected until SHP_PORT_BASE or SHP_COORDINATOR_PORT changes.',
    );
  });

  it('should not flag the coordinator port for multi-host placement', () => {
    validatePortLayout(5432, 5431, true);

    expect(warnSpy).not.toHaveBeenCalled();
  });

  it('should warn about privileged worker ports', () => {
    validatePortLayout(undefined, 100, false);

    expect(warnSpy).toHaveBeenCalledWith('SHP_PORT_BASE=100 publishes worker ports below 1024; this usually requires root.');
  });
});
