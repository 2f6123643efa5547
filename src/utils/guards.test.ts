import { expect } from 'chai';
import { asNumber, asString, isRecord, readPath } from './guards.js';
import { deepFreeze } from './freeze.js';

describe('guards', () => {
  it('should recognise plain records only', () => {
    expect(isRecord({})).to.be.true;
    expect(isRecord([])).to.be.false;
    expect(isRecord(null)).to.be.false;
    expect(isRecord('x')).to.be.false;
  });

  it('should read dotted paths through objects and arrays', () => {
    const payload = { data: { user: { id: 7 } }, items: [{ name: 'a' }] };
    expect(readPath(payload, 'data.user.id')).to.equal(7);
    expect(readPath(payload, 'items.0.name')).to.equal('a');
    expect(readPath(payload, 'items.x')).to.be.undefined;
    expect(readPath(payload, 'data.user.id.deeper')).to.be.undefined;
  });

  it('should coerce scalars to strings', () => {
    expect(asString('x')).to.equal('x');
    expect(asString('')).to.be.undefined;
    expect(asString(12)).to.equal('12');
    expect(asString(false)).to.equal('false');
    expect(asString({})).to.be.undefined;
  });

  it('should coerce numeric strings to numbers', () => {
    expect(asNumber(3600)).to.equal(3600);
    expect(asNumber('7200')).to.equal(7200);
    expect(asNumber(' ')).to.be.undefined;
    expect(asNumber('soon')).to.be.undefined;
    expect(asNumber(Number.NaN)).to.be.undefined;
  });

  it('should freeze nested objects', () => {
    const frozen = deepFreeze({ a: { b: [1, 2] } });
    expect(Object.isFrozen(frozen)).to.be.true;
    expect(Object.isFrozen(frozen.a)).to.be.true;
    expect(Object.isFrozen(frozen.a.b)).to.be.true;
  });
});
