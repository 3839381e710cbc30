import { KeySpec } from '../../../src/core/domain/readiness/value-objects/key-spec.vo';
import { KeyList } from '../../../src/core/domain/readiness/value-objects/key-list.vo';

describe('KeySpec Value Object', () => {
  const mandatory = KeyList.parse('redis,postgresql', 'M');

  it('should strip slashes around the prefix', () => {
    const spec = KeySpec.create({
      prefix: '/services/orders/',
      mandatory,
      optional: KeyList.empty(),
      sentinel: 'ping',
    });
    expect(spec.prefix).toBe('services/orders');
    expect(spec.pathFor('redis')).toBe('services/orders/redis');
  });

  it('should be frozen', () => {
    const spec = KeySpec.create({ prefix: 'app', mandatory, optional: KeyList.empty(), sentinel: 'ping' });
    expect(Object.isFrozen(spec)).toBe(true);
  });

  it('should reject a prefix made only of slashes', () => {
    expect(() =>
      KeySpec.create({ prefix: '//', mandatory, optional: KeyList.empty(), sentinel: 'ping' }),
    ).toThrow('Config-store prefix must name at least one path segment.');
  });

  it('should require at least one mandatory key', () => {
    expect(() =>
      KeySpec.create({
        prefix: 'app',
        mandatory: KeyList.empty(),
        optional: KeyList.empty(),
        sentinel: 'ping',
      }),
    ).toThrow('At least one mandatory config-store key is required.');
  });

  it('should reject an invalid sentinel key', () => {
    expect(() =>
      KeySpec.create({ prefix: 'app', mandatory, optional: KeyList.empty(), sentinel: 'a b' }),
    ).toThrow('Invalid connectivity sentinel key: "a b".');
  });

  it('should reject keys listed as both mandatory and optional', () => {
    expect(() =>
      KeySpec.create({
        prefix: 'app',
        mandatory,
        optional: KeyList.parse('postgresql,flags,redis', 'O'),
        sentinel: 'ping',
      }),
    ).toThrow('Keys listed as both mandatory and optional: redis, postgresql.');
  });
});
