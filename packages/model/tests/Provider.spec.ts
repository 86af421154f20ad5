import { describe, expect, it } from 'vitest';

import { RecordError } from '../src/errors';
import { Provider } from '../src/Provider';

describe('Provider', () => {
  it('should key the default provider by family alone', () => {
    const provider = new Provider('aws', null, 'us-east-1');
    expect(provider.key).toBe('aws');
    expect(provider.isDefault).toBe(true);
  });

  it('should key an aliased provider by family and alias', () => {
    const provider = new Provider('aws', 'west', 'us-west-2');
    expect(provider.key).toBe('aws.west');
    expect(provider.isDefault).toBe(false);
  });

  it('should convert to a plain record', () => {
    expect(new Provider('aws', 'west', 'us-west-2').toRecord()).toEqual({ family: 'aws', alias: 'west', region: 'us-west-2' });
    expect(new Provider('aws').toRecord()).toEqual({ family: 'aws', alias: null, region: null });
  });

  it('should round-trip through its record', () => {
    const provider = new Provider('aws', 'eu', 'eu-west-1');
    expect(Provider.fromRecord(provider.toRecord()).equals(provider)).toBe(true);
  });

  it('should read missing alias and region as null', () => {
    const provider = Provider.fromRecord({ family: 'aws' });
    expect(provider.alias).toBeNull();
    expect(provider.region).toBeNull();
  });

  it('should reject records without a family', () => {
    expect(() => Provider.fromRecord({ alias: 'west' })).toThrow(RecordError);
    expect(() => Provider.fromRecord('aws')).toThrow('Provider record must be an object');
  });

  it('should reject a non-string region', () => {
    expect(() => Provider.fromRecord({ family: 'aws', region: 42 })).toThrow('Provider "region" must be a string or null');
  });
});
