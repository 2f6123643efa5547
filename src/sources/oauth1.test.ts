import { expect } from 'chai';
import {
  parseOAuthHeader,
  percentEncode,
  signOAuth1Request,
  signatureBaseString,
  signingKey,
  verifyOAuth1Signature,
} from './oauth1.js';
import type { HttpRequestDescriptor } from '../http/types.js';

describe('OAuth 1.0a signing', () => {
  const consumer = { key: 'test-consumer-key', secret: 'test-consumer-secret' };

  it('should percent-encode reserved characters the RFC 3986 way', () => {
    expect(percentEncode("a b!*'()~")).to.equal('a%20b%21%2A%27%28%29~');
  });

  it('should build a signing key from both secrets', () => {
    expect(signingKey('c&s', 't s')).to.equal('c%26s&t%20s');
    expect(signingKey('cs')).to.equal('cs&');
  });

  it('should build a signature base string with sorted parameters', () => {
    const base = signatureBaseString('post', 'https://API.example.com:443/1/req?x=1', [
      ['b', '2'],
      ['a', 'z'],
      ['a', 'y'],
    ]);
    expect(base).to.equal(
      'POST&https%3A%2F%2Fapi.example.com%2F1%2Freq&a%3Dy%26a%3Dz%26b%3D2'
    );
  });

  it('should sign a request with a verifiable Authorization header', () => {
    const request: HttpRequestDescriptor = {
      method: 'POST',
      url: 'https://api.example.com/oauth/access_token',
      body: { encoding: 'form', data: { extra: 'v' } },
      oauth1: {
        token: 'test-request-token',
        tokenSecret: 'test-request-secret',
        params: { oauth_verifier: 'verifier-1' },
      },
    };

    const signed = signOAuth1Request(request, consumer, {
      nonce: 'fixed-nonce',
      timestamp: 1_700_000_000,
    });
    const header = signed.headers?.Authorization ?? '';
    const params = parseOAuthHeader(header);

    expect(header.startsWith('OAuth ')).to.be.true;
    expect(params).to.include({
      oauth_consumer_key: 'test-consumer-key',
      oauth_nonce: 'fixed-nonce',
      oauth_signature_method: 'HMAC-SHA1',
      oauth_timestamp: '1700000000',
      oauth_token: 'test-request-token',
      oauth_verifier: 'verifier-1',
      oauth_version: '1.0',
    });
    expect(params).to.not.have.property('oauth_token_secret');
    expect(
      verifyOAuth1Signature(signed, consumer.secret, 'test-request-secret')
    ).to.be.true;
  });

  it('should fail verification with the wrong token secret', () => {
    const signed = signOAuth1Request(
      {
        method: 'GET',
        url: 'https://api.example.com/account',
        query: { include_email: 'true' },
        oauth1: { token: 't', tokenSecret: 'right' },
      },
      consumer
    );
    expect(verifyOAuth1Signature(signed, consumer.secret, 'right')).to.be.true;
    expect(verifyOAuth1Signature(signed, consumer.secret, 'wrong')).to.be.false;
  });

  it('should fail verification when the query was tampered with', () => {
    const signed = signOAuth1Request(
      {
        method: 'GET',
        url: 'https://api.example.com/account',
        query: { include_email: 'true' },
      },
      consumer
    );
    const tampered = { ...signed, query: { include_email: 'false' } };
    expect(verifyOAuth1Signature(tampered, consumer.secret)).to.be.false;
  });

  it('should reject requests without an Authorization header', () => {
    expect(
      verifyOAuth1Signature(
        { method: 'GET', url: 'https://api.example.com/' },
        consumer.secret
      )
    ).to.be.false;
  });

  it('should parse quoted header pairs', () => {
    expect(
      parseOAuthHeader('OAuth oauth_token="a%20b", oauth_callback="oob"')
    ).to.deep.equal({ oauth_token: 'a b', oauth_callback: 'oob' });
  });
});
