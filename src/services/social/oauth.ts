// src/services/social/oauth.ts

import crypto from 'crypto';

export interface OAuthCredentials {
    consumerKey: string;
    consumerSecret: string;
    token: string;
    tokenSecret: string;
}

export interface OAuthRequest {
    method: string;
    url: string;
    params?: Record<string, string>;
    nonce?: string;
    timestamp?: string;
}

// RFC 3986 percent-encoding
export const percentEncode = (value: string): string =>
    encodeURIComponent(value).replace(/[!'()*]/g, char => `%${char.charCodeAt(0).toString(16).toUpperCase()}`);

/**
 * HMAC-SHA1 signature over the method, the bare URL and every oauth and query parameter.
 * JSON and multipart bodies are not part of the signature.
 */
export const createOAuthSignature = (
    method: string,
    url: string,
    params: Record<string, string>,
    credentials: Pick<OAuthCredentials, 'consumerSecret' | 'tokenSecret'>
): string => {
    const sortedParams = Object.keys(params)
        .map(key => [percentEncode(key), percentEncode(params[key] ?? '')] as const)
        .sort(([a, av], [b, bv]) => {
            if (a !== b) return a < b ? -1 : 1;
            return av < bv ? -1 : av > bv ? 1 : 0;
        })
        .map(([key, value]) => `${key}=${value}`)
        .join('&');

    const signatureBaseString = [
        method.toUpperCase(),
        percentEncode(url),
        percentEncode(sortedParams)
    ].join('&');

    const signingKey = `${percentEncode(credentials.consumerSecret)}&${percentEncode(credentials.tokenSecret)}`;

    return crypto
        .createHmac('sha1', signingKey)
        .update(signatureBaseString)
        .digest('base64');
};

/**
 * Build the `Authorization: OAuth ...` header value for a request
 */
export const buildOAuthHeader = (request: OAuthRequest, credentials: OAuthCredentials): string => {
    const parsed = new URL(request.url);
    const baseUrl = `${parsed.protocol}//${parsed.host}${parsed.pathname}`;

    const queryParams: Record<string, string> = { ...request.params };
    parsed.searchParams.forEach((value, key) => {
        queryParams[key] = value;
    });

    const oauthParams: Record<string, string> = {
        oauth_consumer_key: credentials.consumerKey,
        oauth_nonce: request.nonce ?? crypto.randomBytes(16).toString('hex'),
        oauth_signature_method: 'HMAC-SHA1',
        oauth_timestamp: request.timestamp ?? Math.floor(Date.now() / 1000).toString(),
        oauth_token: credentials.token,
        oauth_version: '1.0'
    };

    oauthParams.oauth_signature = createOAuthSignature(
        request.method,
        baseUrl,
        { ...queryParams, ...oauthParams },
        credentials
    );

    return 'OAuth ' + Object.keys(oauthParams)
        .sort()
        .map(key => `${percentEncode(key)}="${percentEncode(oauthParams[key] ?? '')}"`)
        .join(', ');
};
