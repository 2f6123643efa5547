import { expect } from 'chai';
import { OAuthClient } from './client.js';
import { MemoryCacheStore } from './cache/memory-store.js';
import { fromEnvironment } from './config/from-environment.js';
import { defineSource } from './sources/define.js';
import { FakeTransport, jsonResponse } from './testUtils/fakeTransport.js';
import { expectAuthError, expectAuthErrorSync, silentLogger } from './testUtils/testHelpers.js';
import { githubPayloads, testConfigs } from './fixtures/test-data.js';

describe('OAuthClient', () => {
  let cacheStore: MemoryCacheStore;
  let transport: FakeTransport;

  beforeEach(() => {
    cacheStore = new MemoryCacheStore();
    transport = new FakeTransport()
      .on('https://github.com/login/oauth/access_token', jsonResponse(githubPayloads.token))
      .on('https://api.github.com/user', jsonResponse(githubPayloads.profile));
  });

  function client(): OAuthClient {
    return new OAuthClient({
      config: fromEnvironment({
        env: {
          OAUTH_GITHUB_CLIENT_ID: 'abc',
          OAUTH_GITHUB_CLIENT_SECRET: 'test-secret',
          OAUTH_GITHUB_REDIRECT_URI: 'http://x/cb',
        },
      }),
      cacheStore,
      transport,
      logger: silentLogger(),
    });
  }

  it('should run a full login through the configured resolver', async () => {
    const oauth = client();

    const url = new URL(await oauth.authorize('github', undefined, 's1'));
    expect(url.searchParams.get('client_id')).to.equal('abc');

    const identity = await oauth.login('github', undefined, { code: 'c1', state: 's1' });
    expect(identity.source).to.equal('github');
    expect(identity.uuid).to.equal('1001');
  });

  it('should prefer an explicit config over the resolver', async () => {
    const oauth = client();
    const url = new URL(
      await oauth.authorize('github', { ...testConfigs.minimal, clientId: 'other' }, 's1')
    );
    expect(url.searchParams.get('client_id')).to.equal('other');
  });

  it('should share pending state across requests built from one client', async () => {
    const oauth = client();
    await oauth.authorize('github', undefined, 's1');
    await oauth.login('github', undefined, { code: 'c1', state: 's1' });

    await expectAuthError(
      () => oauth.login('github', undefined, { code: 'c1', state: 's1' }),
      'StateMismatch'
    );
  });

  it('should fail with ConfigResolutionFailed when the resolver has nothing', async () => {
    const oauth = client();
    const error = expectAuthErrorSync(
      () => oauth.request('gitee'),
      'ConfigResolutionFailed'
    );
    expect(error.error_description).to.equal(
      'Config resolver failed for gitee: Missing environment variables: OAUTH_GITEE_CLIENT_ID, OAUTH_GITEE_CLIENT_SECRET'
    );
  });

  it('should serve custom sources added at construction', () => {
    const acme = defineSource({
      name: 'acme',
      endpoints: {
        authorize: 'https://id.acme.example.com/authorize',
        token: 'https://id.acme.example.com/token',
      },
      identity: { uuid: 'id' },
    });
    const oauth = new OAuthClient({ sources: [acme], logger: silentLogger() });

    expect(oauth.registry.has('acme')).to.be.true;
    expect(oauth.registry.has('github')).to.be.true;
    expect(oauth.request('acme', testConfigs.minimal).source).to.equal(acme);
  });

  it('should report NotSupported for refresh and revoke the source lacks', async () => {
    const oauth = client();
    await expectAuthError(() => oauth.refresh('github', undefined, 'rt'), 'NotSupported');
    await expectAuthError(() => oauth.revoke('github', undefined, 'at'), 'NotSupported');
  });
});
