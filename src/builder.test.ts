import { expect } from 'chai';
import sinon from 'sinon';
import { buildAuthRequest } from './builder.js';
import { AuthRequest } from './auth-request.js';
import { MemoryCacheStore } from './cache/memory-store.js';
import {
  getDefaultCacheStore,
  resetDefaultCacheStore,
} from './cache/default-store.js';
import { SourceRegistry } from './registry.js';
import { defineSource } from './sources/define.js';
import { github } from './sources/providers/index.js';
import { FakeTransport } from './testUtils/fakeTransport.js';
import { expectAuthErrorSync, recordingLogger, silentLogger } from './testUtils/testHelpers.js';
import { testConfigs } from './fixtures/test-data.js';

const acme = defineSource({
  name: 'acme',
  endpoints: {
    authorize: 'https://id.acme.example.com/authorize',
    token: 'https://id.acme.example.com/token',
    profile: 'https://api.acme.example.com/me',
  },
  identity: { uuid: 'id' },
});

describe('buildAuthRequest', () => {
  afterEach(() => {
    resetDefaultCacheStore();
    sinon.restore();
  });

  it('should bind a registered source to a static config', () => {
    const request = buildAuthRequest({
      source: 'github',
      config: testConfigs.minimal,
      logger: silentLogger(),
    });

    expect(request).to.be.instanceOf(AuthRequest);
    expect(request.source).to.equal(github);
    expect(request.config).to.deep.equal(testConfigs.minimal);
    expect(Object.isFrozen(request.config)).to.be.true;
  });

  it('should call a resolver with the key it was given', () => {
    const resolver = sinon.stub().returns(testConfigs.minimal);

    buildAuthRequest({ source: 'GitHub', config: resolver, logger: silentLogger() });

    expect(resolver.calledOnceWithExactly('GitHub')).to.be.true;
  });

  it('should accept a descriptor directly', () => {
    const request = buildAuthRequest({
      source: acme,
      config: testConfigs.minimal,
      logger: silentLogger(),
    });
    expect(request.source).to.equal(acme);
  });

  it('should find sources added through extendSources or a custom registry', () => {
    const extended = buildAuthRequest({
      source: 'acme',
      config: testConfigs.minimal,
      extendSources: [acme],
      logger: silentLogger(),
    });
    expect(extended.source).to.equal(acme);

    const registry = new SourceRegistry({ partner: acme });
    const viaRegistry = buildAuthRequest({
      source: 'partner',
      config: testConfigs.minimal,
      registry,
      logger: silentLogger(),
    });
    expect(viaRegistry.source).to.equal(acme);
  });

  it('should fail with UnknownSource for unregistered keys', () => {
    const error = expectAuthErrorSync(
      () => buildAuthRequest({ source: 'myspace', config: testConfigs.minimal }),
      'UnknownSource'
    );
    expect(error.statusCode).to.equal(404);
  });

  it('should fail with ConfigResolutionFailed when no config is given', () => {
    const error = expectAuthErrorSync(
      () => buildAuthRequest({ source: 'github' }),
      'ConfigResolutionFailed'
    );
    expect(error.error_description).to.equal(
      'No config or config resolver supplied for github'
    );
    expect(error.source).to.equal('github');
  });

  it('should wrap resolver failures with their cause', () => {
    const cause = new Error('Missing environment variables: OAUTH_GITHUB_CLIENT_ID');

    const error = expectAuthErrorSync(
      () =>
        buildAuthRequest({
          source: 'github',
          config: () => {
            throw cause;
          },
        }),
      'ConfigResolutionFailed'
    );

    expect(error.error_description).to.equal(
      'Config resolver failed for github: Missing environment variables: OAUTH_GITHUB_CLIENT_ID'
    );
    expect(error.cause).to.equal(cause);
  });

  it('should reject invalid configs', () => {
    const error = expectAuthErrorSync(
      () =>
        buildAuthRequest({
          source: 'github',
          config: { clientId: 'abc', clientSecret: '' },
        }),
      'ConfigResolutionFailed'
    );
    expect(error.error_description).to.equal(
      'Invalid config for github: clientSecret: clientSecret is required'
    );
  });

  it('should reject invalid options before resolving anything', () => {
    const resolver = sinon.stub().returns(testConfigs.minimal);
    const error = expectAuthErrorSync(
      () => buildAuthRequest({ source: '  ', config: resolver, timeoutMs: -5 }),
      'ConfigResolutionFailed'
    );
    expect(error.error_description).to.match(/^Invalid build options: /);
    expect(error.error_description).to.include('timeoutMs');
    expect(resolver.called).to.be.false;
  });

  it('should fall back to the process-wide default cache store', async () => {
    const request = buildAuthRequest({
      source: 'github',
      config: testConfigs.minimal,
      logger: silentLogger(),
    });

    await request.authorize('s1');

    expect(await getDefaultCacheStore().get('oauth:state:s1')).to.be.a('string');
  });

  it('should pass the cache store, transport and logger through', async () => {
    const cacheStore = new MemoryCacheStore();
    const transport = new FakeTransport();
    const { logger, transport: logs } = recordingLogger();

    const request = buildAuthRequest({
      source: 'github',
      config: testConfigs.minimal,
      cacheStore,
      transport,
      logger,
      timeoutMs: 1000,
      stateTtlSeconds: 30,
    });
    await request.authorize('s1');

    expect(cacheStore.remainingTtl('oauth:state:s1')).to.equal(30);
    expect(logs.logs[0]).to.include({
      message: 'AuthRequest built',
      stage: 'build',
      grant: 'authorization_code',
      customCacheStore: true,
    });
  });
});
