import { base32Decode, hotp, timeStep, totp } from '../totp';

// RFC 4226 / RFC 6238 reference secret: ASCII "12345678901234567890"
const RFC_SECRET_BASE32 = 'GEZDGNBVGY3TQOJQGEZDGNBVGY3TQOJQ';
const RFC_KEY = Buffer.from('12345678901234567890', 'ascii');

describe('base32Decode', () => {
  it('should decode a plain base32 string', () => {
    expect(base32Decode('JBSWY3DP').toString('ascii')).toBe('Hello');
  });

  it('should ignore case, spaces and padding', () => {
    expect(base32Decode('jbsw y3dp ====').toString('ascii')).toBe('Hello');
  });

  it('should decode the reference secret', () => {
    expect(base32Decode(RFC_SECRET_BASE32).equals(RFC_KEY)).toBe(true);
  });

  it('should reject characters outside the alphabet', () => {
    expect(() => base32Decode('JBSW1')).toThrow('Invalid base32 character: 1');
  });
});

describe('hotp', () => {
  it('should match the RFC 4226 reference values', () => {
    const expected = ['755224', '287082', '359152', '969429', '338314', '254676', '287922', '162583', '399871', '520489'];

    expected.forEach((code, counter) => {
      expect(hotp(RFC_KEY, counter)).toBe(code);
    });
  });
});

describe('totp', () => {
  it('should match the RFC 6238 SHA-1 reference values', () => {
    expect(totp(RFC_SECRET_BASE32, 59_000, { digits: 8 })).toBe('94287082');
    expect(totp(RFC_SECRET_BASE32, 1_111_111_109_000, { digits: 8 })).toBe('07081804');
    expect(totp(RFC_SECRET_BASE32, 1_111_111_111_000, { digits: 8 })).toBe('14050471');
    expect(totp(RFC_SECRET_BASE32, 1_234_567_890_000, { digits: 8 })).toBe('89005924');
    expect(totp(RFC_SECRET_BASE32, 2_000_000_000_000, { digits: 8 })).toBe('69279037');
    expect(totp(RFC_SECRET_BASE32, 20_000_000_000_000, { digits: 8 })).toBe('65353130');
  });

  it('should produce 6 digit codes by default', () => {
    expect(totp(RFC_SECRET_BASE32, 59_000)).toBe('287082');
  });

  it('should be stable within one time step and change across steps', () => {
    const start = 1_699_999_990_000; // 10s into a 30s window
    const sameWindow = totp(RFC_SECRET_BASE32, start);

    expect(totp(RFC_SECRET_BASE32, start + 19_000)).toBe(sameWindow);
    expect(timeStep(start + 20_000)).toBe(timeStep(start) + 1);
  });
});
