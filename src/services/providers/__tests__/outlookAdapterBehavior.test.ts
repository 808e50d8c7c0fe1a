import assert from 'node:assert/strict';
import {
  AuthExchangeError,
  AuthExpiredError,
  MalformedRecordError,
  PermanentProviderError,
  TransientProviderError,
} from '../../../shared/errors.js';
import type { FetchLike } from '../http.js';
import { OutlookAdapter } from '../outlookAdapter.js';
import { FIXED_NOW } from '../../../../tests/support/fakes.js';
import { scriptedFetch, unexpectedFetch } from '../../../../tests/support/scripted.js';

const GRAPH = 'https://graph.microsoft.com/v1.0';
const TOKEN_URL = 'https://login.microsoftonline.com/common/oauth2/v2.0/token';
const DELTA_LINK = `${GRAPH}/me/mailFolders/inbox/messages/delta?$deltatoken=token-2`;

const credential = { accessToken: 'access-1', expiresAt: new Date(FIXED_NOW.getTime() + 3_600_000) };

const adapter = (options: { fetchImpl?: FetchLike; maxPages?: number } = {}) =>
  new OutlookAdapter({
    clientId: 'test-client',
    clientSecret: 'test-secret',
    tenant: 'common',
    redirectUri: 'http://localhost:3000/api/oauth/outlook/callback',
    maxMessages: 2,
    maxPages: options.maxPages ?? 10,
    fetchImpl: options.fetchImpl ?? unexpectedFetch,
    now: () => FIXED_NOW,
  });

const graphMessage = (id: string, extra: Record<string, unknown> = {}) => ({
  id,
  conversationId: `conversation-${id}`,
  subject: `subject ${id}`,
  receivedDateTime: '2024-04-01T10:00:00Z',
  hasAttachments: false,
  ...extra,
});

const formOf = (body: string | undefined) => new URLSearchParams(body ?? '');

let passed = 0;
let failed = 0;

const test = async (name: string, fn: () => Promise<void> | void) => {
  try {
    await fn();
    passed += 1;
  } catch (error) {
    failed += 1;
    console.error(`FAIL: ${name}`);
    console.error(`  ${error}`);
  }
};

await test('authorizeUrl targets the tenant authority with offline scopes and the state', () => {
  const url = new URL(adapter().authorizeUrl('state-1'));

  assert.equal(url.origin + url.pathname, 'https://login.microsoftonline.com/common/oauth2/v2.0/authorize');
  assert.equal(url.searchParams.get('scope'), 'offline_access Mail.Read Mail.Send User.Read');
  assert.equal(url.searchParams.get('state'), 'state-1');
  assert.equal(url.searchParams.get('response_type'), 'code');
});

await test('exchangeCode posts the code as a form and reads the issued credentials', async () => {
  const http = scriptedFetch([{
    match: TOKEN_URL,
    json: { access_token: 'access-1', refresh_token: 'refresh-1', expires_in: '3599' },
    check: (call) => {
      assert.equal(call.method, 'POST');
      assert.equal(call.headers['content-type'], 'application/x-www-form-urlencoded');
      const form = formOf(call.body);
      assert.equal(form.get('grant_type'), 'authorization_code');
      assert.equal(form.get('code'), 'code-1');
      assert.equal(form.get('client_secret'), 'test-secret');
    },
  }]);

  assert.deepEqual(await adapter({ fetchImpl: http.fetchImpl }).exchangeCode('code-1'), {
    accessToken: 'access-1',
    refreshToken: 'refresh-1',
    expiresIn: 3599,
  });
});

await test('a rejected code exchange is an exchange error', async () => {
  const http = scriptedFetch([{ match: TOKEN_URL, status: 400, json: { error: 'invalid_grant' } }]);
  await assert.rejects(
    adapter({ fetchImpl: http.fetchImpl }).exchangeCode('code-1'),
    (error: unknown) => error instanceof AuthExchangeError && error.status === 400,
  );
});

await test('refreshCredential classifies token endpoint failures', async () => {
  const revoked = scriptedFetch([{
    match: TOKEN_URL,
    status: 400,
    json: { error: 'invalid_grant', error_description: 'AADSTS70008: The refresh token has expired.' },
    check: (call) => assert.equal(formOf(call.body).get('refresh_token'), 'refresh-1'),
  }]);
  await assert.rejects(adapter({ fetchImpl: revoked.fetchImpl }).refreshCredential('refresh-1'), AuthExpiredError);

  const unavailable = scriptedFetch([{ match: TOKEN_URL, status: 503, text: 'busy' }]);
  await assert.rejects(adapter({ fetchImpl: unavailable.fetchImpl }).refreshCredential('refresh-1'), TransientProviderError);

  const badClient = scriptedFetch([{ match: TOKEN_URL, status: 401, json: { error: 'invalid_client' } }]);
  await assert.rejects(
    adapter({ fetchImpl: badClient.fetchImpl }).refreshCredential('refresh-1'),
    (error: unknown) => error instanceof PermanentProviderError && error.status === 401,
  );
});

await test('getProfile falls back to the principal name when mail is empty', async () => {
  const http = scriptedFetch([{
    match: `${GRAPH}/me?`,
    json: { mail: null, userPrincipalName: 'owner@example.test', displayName: 'Owner' },
  }]);

  assert.deepEqual(await adapter({ fetchImpl: http.fetchImpl }).getProfile('access-1'), {
    emailAddress: 'owner@example.test',
    displayName: 'Owner',
  });
});

await test('a first sync walks every delta page, drops removals and lists attachments', async () => {
  const http = scriptedFetch([
    {
      match: `${GRAPH}/me/mailFolders/inbox/messages/delta?$select=id,conversationId`,
      json: {
        value: [
          graphMessage('m-1', { hasAttachments: true }),
          { id: 'm-old', '@removed': { reason: 'deleted' } },
        ],
        '@odata.nextLink': `${GRAPH}/me/mailFolders/inbox/messages/delta?$skiptoken=page-2`,
      },
      check: (call) => {
        assert.equal(call.headers.prefer, 'odata.maxpagesize=2');
        assert.equal(call.headers.authorization, 'Bearer access-1');
      },
    },
    {
      match: '$skiptoken=page-2',
      json: { value: [graphMessage('m-2')], '@odata.deltaLink': DELTA_LINK },
    },
    {
      match: `${GRAPH}/me/messages/m-1/attachments?$select=id,name,contentType,size`,
      json: { value: [{ id: 'att-1', name: 'plan.docx', contentType: 'application/msword', size: 4096 }] },
    },
  ]);

  const delta = await adapter({ fetchImpl: http.fetchImpl }).fetchDelta(credential, null);

  assert.equal(delta.mode, 'full');
  assert.deepEqual(delta.nextCursor, { provider: 'outlook', deltaLink: DELTA_LINK });
  assert.deepEqual(delta.records.map((record) => record.id), ['m-1', 'm-2']);
  assert.deepEqual(delta.records[0]?.attachments, [
    { id: 'att-1', name: 'plan.docx', contentType: 'application/msword', size: 4096 },
  ]);
  http.assertDone();
});

await test('an incremental sync resumes from the stored delta link', async () => {
  const http = scriptedFetch([{
    match: DELTA_LINK,
    json: { value: [graphMessage('m-3')], '@odata.deltaLink': `${GRAPH}/delta?$deltatoken=token-3` },
  }]);

  const delta = await adapter({ fetchImpl: http.fetchImpl })
    .fetchDelta(credential, { provider: 'outlook', deltaLink: DELTA_LINK });

  assert.equal(delta.mode, 'incremental');
  assert.deepEqual(delta.nextCursor, { provider: 'outlook', deltaLink: `${GRAPH}/delta?$deltatoken=token-3` });
});

await test('hitting the page cap stores the next link so the walk resumes next time', async () => {
  const nextLink = `${GRAPH}/me/mailFolders/inbox/messages/delta?$skiptoken=page-2`;
  const http = scriptedFetch([{
    match: '/messages/delta?$select=',
    json: { value: [graphMessage('m-1')], '@odata.nextLink': nextLink },
  }]);

  const delta = await adapter({ fetchImpl: http.fetchImpl, maxPages: 1 }).fetchDelta(credential, null);

  assert.deepEqual(delta.nextCursor, { provider: 'outlook', deltaLink: nextLink });
  assert.equal(delta.records.length, 1);
});

await test('an expired delta token restarts from a full traversal', async () => {
  for (const stale of [
    { status: 410, json: { error: { code: 'SyncStateNotFound' } } },
    { status: 400, json: { error: { code: 'resyncRequired' } } },
  ]) {
    const http = scriptedFetch([
      { match: DELTA_LINK, ...stale },
      { match: '/messages/delta?$select=', json: { value: [], '@odata.deltaLink': DELTA_LINK } },
    ]);

    const delta = await adapter({ fetchImpl: http.fetchImpl })
      .fetchDelta(credential, { provider: 'outlook', deltaLink: DELTA_LINK });

    assert.equal(delta.mode, 'full');
    http.assertDone();
  }
});

await test('an unrelated 400 on the delta link is not treated as a stale cursor', async () => {
  const http = scriptedFetch([{ match: DELTA_LINK, status: 400, json: { error: { code: 'BadRequest' } } }]);

  await assert.rejects(
    adapter({ fetchImpl: http.fetchImpl }).fetchDelta(credential, { provider: 'outlook', deltaLink: DELTA_LINK }),
    PermanentProviderError,
  );
});

await test('a delta page with neither link is a permanent failure', async () => {
  const http = scriptedFetch([{ match: '/messages/delta?$select=', json: { value: [] } }]);
  await assert.rejects(
    adapter({ fetchImpl: http.fetchImpl }).fetchDelta(credential, null),
    /neither nextLink nor deltaLink/,
  );
});

await test('parseRecord normalizes recipients, bodies and dates', () => {
  const outlook = adapter();
  const parsed = outlook.parseRecord({
    id: 'm-1',
    conversationId: 'conv-1',
    subject: 'Plan',
    bodyPreview: 'See attached',
    body: { contentType: 'html', content: '<p>See attached</p>' },
    from: { emailAddress: { name: 'Ana', address: 'ana@example.test' } },
    toRecipients: [
      { emailAddress: { name: 'owner@example.test', address: 'owner@example.test' } },
      { emailAddress: { name: 'Bob', address: null } },
    ],
    ccRecipients: null,
    receivedDateTime: null,
    sentDateTime: '2024-04-01T09:15:00Z',
    hasAttachments: true,
  });

  assert.deepEqual(parsed, {
    providerMessageId: 'm-1',
    providerThreadId: 'conv-1',
    from: 'Ana <ana@example.test>',
    to: ['owner@example.test', 'Bob'],
    cc: [],
    bcc: [],
    subject: 'Plan',
    date: new Date('2024-04-01T09:15:00.000Z'),
    bodyText: '',
    bodyHtml: '<p>See attached</p>',
    snippet: 'See attached',
    attachments: [],
    hasAttachments: true,
  });

  const plain = outlook.parseRecord({ id: 'm-2', body: { contentType: 'text', content: 'hello' } });
  assert.equal(plain.bodyText, 'hello');
  assert.equal(plain.providerThreadId, 'm-2');
  assert.equal(plain.date.toISOString(), FIXED_NOW.toISOString());

  assert.throws(() => outlook.parseRecord({ subject: 'no id' }), MalformedRecordError);
});

await test('sendMessage uses sendMail for new mail and the reply endpoint for replies', async () => {
  const http = scriptedFetch([
    {
      match: `${GRAPH}/me/sendMail`,
      status: 202,
      check: (call) => {
        assert.deepEqual(JSON.parse(call.body ?? '{}'), {
          message: {
            subject: 'Hi',
            body: { contentType: 'Text', content: 'Hello' },
            toRecipients: [{ emailAddress: { address: 'friend@example.test' } }],
            ccRecipients: [],
            bccRecipients: [],
          },
          saveToSentItems: true,
        });
      },
    },
    { match: `${GRAPH}/me/messages/m-9/reply`, status: 202 },
  ]);
  const outlook = adapter({ fetchImpl: http.fetchImpl });

  assert.deepEqual(
    await outlook.sendMessage(credential, { to: ['friend@example.test'], subject: 'Hi', bodyText: 'Hello' }),
    { status: 'sent', providerMessageId: null, providerThreadId: null },
  );
  assert.deepEqual(
    await outlook.sendMessage(credential, {
      to: ['friend@example.test'],
      subject: 'Re: Hi',
      bodyHtml: '<p>Yes</p>',
      replyToProviderMessageId: 'm-9',
      providerThreadId: 'conv-9',
    }),
    { status: 'sent', providerMessageId: null, providerThreadId: 'conv-9' },
  );
  http.assertDone();
});

console.log(`\n${passed + failed} tests: ${passed} passed, ${failed} failed`);
if (failed > 0) {
  process.exit(1);
}
