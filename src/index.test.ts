import { expect } from 'chai';
import { describe, it } from 'mocha';

import { version, OAuthClient, BUILTIN_SOURCES } from './index.js';
import { moduleData } from './fixtures/test-data.js';

describe('unified-oauth-client', () => {
  it('should export all required modules and properties', async () => {
    expect(version).to.equal(moduleData.expectedVersion);
    expect(OAuthClient).to.be.a('function');
    expect(BUILTIN_SOURCES).to.have.length(38);

    const module = await import('./index.js');
    expect(module.default).to.deep.equal({ version: moduleData.expectedVersion });

    moduleData.expectedExports.forEach((exportName: string) => {
      expect(module).to.have.property(exportName);
    });
  });
});
