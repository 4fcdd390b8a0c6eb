import { toJsonView } from './serialization';

describe('toJsonView', () => {
  it('turns wei amounts into decimal strings and absent values into null', () => {
    expect(
      toJsonView({ propertyId: 3, amount: 1500000000000000000n, winner: null, ended: true, nested: { a: 1 } }),
    ).toEqual({ propertyId: 3, amount: '1500000000000000000', winner: null, ended: true, nested: null });
  });
});
