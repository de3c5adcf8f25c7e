import { redactSecret } from '../config.utils';

describe('redactSecret', () => {
  it('should reveal only the length', () => {
    expect(redactSecret('test-secret')).toBe('[redacted, 11 chars]');
  });

  it('should mark an empty secret as unset', () => {
    expect(redactSecret('')).toBe('[not set]');
  });
});
