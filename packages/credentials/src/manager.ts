import type {KeyObject} from 'node:crypto';

import {forwardStructured, type FetchLike, type UpstreamResponse, type UpstreamTarget} from '@relaygate/forwarder';
import {createNoopLogger, type StructuredLogger} from '@relaygate/logging';
import {z} from 'zod';

import {
  CredentialConfigSchema,
  type CredentialConfig,
  type CredentialConfigInput,
  type CredentialRecord,
  type CredentialState,
  type ReplySummary
} from './contracts';
import {err, ok, type CredentialResult} from './errors';
import {encryptPassword, parsePublicKey} from './password';
import {createInMemoryCredentialStore, type CredentialStore} from './store';

export type CredentialManager = {
  readonly identity: string;
  state: () => CredentialState;
  getValidToken: () => Promise<CredentialResult<string>>;
  invalidate: (token?: string) => Promise<void>;
  execute: <T>(
    attempt: (token: string) => Promise<T>,
    summarize: (result: T) => ReplySummary | null
  ) => Promise<CredentialResult<T>>;
};

export type CreateCredentialManagerInput = {
  config: CredentialConfigInput;
  target: UpstreamTarget;
  store?: CredentialStore;
  fetchImpl?: FetchLike;
  logger?: StructuredLogger;
  now?: () => Date;
};

const RejectionBodySchema = z.object({
  code: z.literal(401),
  message: z.string()
});

const parseJson = (bytes: Uint8Array): unknown => {
  try {
    return JSON.parse(Buffer.from(bytes).toString('utf8'));
  } catch {
    return null;
  }
};

/**
 * True when the upstream refused the token: HTTP 401, or HTTP 200 whose JSON
 * body reports `code: 401` with a message mentioning "unauthorized".
 */
export const isTokenRejected = (reply: ReplySummary) => {
  if (reply.status === 401) {
    return true;
  }

  if (reply.status !== 200 || !reply.body || reply.body.byteLength === 0) {
    return false;
  }

  const parsed = RejectionBodySchema.safeParse(parseJson(reply.body));
  return parsed.success && parsed.data.message.toLowerCase().includes('unauthorized');
};

type LoginAttempt = {kind: 'token'; token: string} | {kind: 'rejected'};

const COMPONENT = 'credentials.manager';

const buildManager = ({
  config,
  publicKey,
  target,
  store,
  logger,
  now,
  fetchImpl
}: {
  config: CredentialConfig;
  publicKey: KeyObject;
  target: UpstreamTarget;
  store: CredentialStore;
  logger: StructuredLogger;
  now: () => Date;
  fetchImpl?: FetchLike;
}): CredentialManager => {
  const identity = config.identity;
  let cached: CredentialRecord | null = null;
  let hydration: Promise<void> | null = null;
  let inflight: Promise<CredentialResult<string>> | null = null;
  let inflightIsRefresh = false;
  let heldToken = false;
  let lastAttemptFailed = false;

  const isFresh = (record: CredentialRecord) =>
    now().getTime() - Date.parse(record.refreshed_at) < config.expiry_window_ms;

  const hydrate = () => {
    hydration ??= store.load(identity).then(
      record => {
        if (record && !cached) {
          cached = record;
          heldToken = true;
        }
      },
      (error: unknown) => {
        logger.warn({
          event: 'credential.store.failed',
          component: COMPONENT,
          message: 'Could not read the credential store; starting without a cached token',
          reason_code: 'store_load_failed',
          metadata: {identity, error}
        });
      }
    );

    return hydration;
  };

  const post = async (path: string, payload: Record<string, string>): Promise<CredentialResult<UpstreamResponse>> => {
    const result = await forwardStructured({
      target,
      method: 'POST',
      path,
      query: {},
      body: {kind: 'json', value: payload},
      ...(fetchImpl ? {fetchImpl} : {})
    });

    return result.ok ? ok(result.value) : err('upstream_unreachable', `${path}: ${result.error.message}`);
  };

  const requestLogin = async (): Promise<CredentialResult<LoginAttempt>> => {
    const password = encryptPassword({password: config.password, publicKey});
    if (!password.ok) {
      return password;
    }

    const response = await post(config.login_path, {email: identity, password: password.value});
    if (!response.ok) {
      return response;
    }

    const {status, headers} = response.value;
    if (status === 401) {
      return ok({kind: 'rejected'});
    }

    if (status < 200 || status > 299) {
      return err('login_failed', `Login returned status ${status}`);
    }

    const token = headers.authorization?.trim();
    if (!token) {
      return err('token_missing', 'Login response carried no authorization header');
    }

    return ok({kind: 'token', token});
  };

  const register = async (): Promise<CredentialResult<void>> => {
    const password = encryptPassword({password: config.password, publicKey});
    if (!password.ok) {
      return password;
    }

    const response = await post(config.register_path, {
      nickname: config.nickname,
      email: identity,
      password: password.value
    });
    if (!response.ok) {
      return response;
    }

    if (response.value.status < 200 || response.value.status > 299) {
      return err('register_failed', `Registration returned status ${response.value.status}`);
    }

    return ok(undefined);
  };

  const persist = async (token: string): Promise<CredentialResult<string>> => {
    const record: CredentialRecord = {identity, token, refreshed_at: now().toISOString()};
    cached = record;
    heldToken = true;

    try {
      await store.save(record);
    } catch (error) {
      logger.warn({
        event: 'credential.store.failed',
        component: COMPONENT,
        message: 'Could not persist the refreshed token; it is kept in memory',
        reason_code: 'store_save_failed',
        metadata: {identity, error}
      });
    }

    return ok(token);
  };

  const login = async (): Promise<CredentialResult<string>> => {
    const first = await requestLogin();
    if (!first.ok) {
      return first;
    }

    if (first.value.kind === 'token') {
      return persist(first.value.token);
    }

    logger.info({
      event: 'credential.register.attempted',
      component: COMPONENT,
      message: 'Login was refused; registering the service account once',
      metadata: {identity}
    });

    const registered = await register();
    if (!registered.ok) {
      return registered;
    }

    const second = await requestLogin();
    if (!second.ok) {
      return second;
    }

    if (second.value.kind === 'rejected') {
      return err('login_rejected', 'Login was refused after registration');
    }

    return persist(second.value.token);
  };

  const refresh = () => {
    if (inflight) {
      return inflight;
    }

    inflightIsRefresh = heldToken;
    const startedAt = now().getTime();
    const flight = login().then(result => {
      lastAttemptFailed = !result.ok;
      if (result.ok) {
        logger.info({
          event: 'credential.login.succeeded',
          component: COMPONENT,
          duration_ms: Math.max(0, now().getTime() - startedAt),
          metadata: {identity}
        });
      } else {
        logger.warn({
          event: 'credential.login.failed',
          component: COMPONENT,
          message: result.error.message,
          reason_code: result.error.code,
          metadata: {identity}
        });
      }

      return result;
    });

    inflight = flight.finally(() => {
      inflight = null;
    });
    return inflight;
  };

  const getValidToken = async (): Promise<CredentialResult<string>> => {
    if (inflight) {
      return inflight;
    }

    await hydrate();
    if (cached && isFresh(cached)) {
      return ok(cached.token);
    }

    return refresh();
  };

  const invalidate = async (token?: string) => {
    if (!cached || (token !== undefined && cached.token !== token)) {
      return;
    }

    cached = null;
    try {
      await store.remove(identity);
    } catch (error) {
      logger.warn({
        event: 'credential.store.failed',
        component: COMPONENT,
        message: 'Could not remove the rejected token from the store',
        reason_code: 'store_remove_failed',
        metadata: {identity, error}
      });
    }
  };

  const execute = async <T>(
    attempt: (token: string) => Promise<T>,
    summarize: (result: T) => ReplySummary | null
  ): Promise<CredentialResult<T>> => {
    const token = await getValidToken();
    if (!token.ok) {
      return token;
    }

    const first = await attempt(token.value);
    const summary = summarize(first);
    if (!summary || !isTokenRejected(summary)) {
      return ok(first);
    }

    logger.info({
      event: 'credential.token.rejected',
      component: COMPONENT,
      message: 'Upstream refused the token; logging in again',
      status_code: summary.status,
      metadata: {identity}
    });

    await invalidate(token.value);
    const renewed = await getValidToken();
    if (!renewed.ok) {
      return renewed;
    }

    return ok(await attempt(renewed.value));
  };

  const state = (): CredentialState => {
    if (inflight) {
      return inflightIsRefresh ? 'reauthenticating' : 'authenticating';
    }

    if (cached) {
      return isFresh(cached) ? 'valid' : 'expired';
    }

    return lastAttemptFailed ? 'failed' : 'no_token';
  };

  return {identity, state, getValidToken, invalidate, execute};
};

export const createCredentialManager = (input: CreateCredentialManagerInput): CredentialResult<CredentialManager> => {
  const parsedConfig = CredentialConfigSchema.safeParse(input.config);
  if (!parsedConfig.success) {
    return err(
      'invalid_input',
      parsedConfig.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
    );
  }

  const publicKey = parsePublicKey(parsedConfig.data.public_key_pem);
  if (!publicKey.ok) {
    return publicKey;
  }

  return ok(
    buildManager({
      config: parsedConfig.data,
      publicKey: publicKey.value,
      target: input.target,
      store: input.store ?? createInMemoryCredentialStore(),
      logger: input.logger ?? createNoopLogger(),
      now: input.now ?? (() => new Date()),
      ...(input.fetchImpl ? {fetchImpl: input.fetchImpl} : {})
    })
  );
};
