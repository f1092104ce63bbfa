import { GetSecretValueCommand, SecretsManagerClient } from '@aws-sdk/client-secrets-manager';
import type { IngestionConfig, RoutingValue } from '../../../shared/types';
import { createError, isValidRegion } from '../../../shared/utils';

const ROUTING_VALUES: readonly RoutingValue[] = ['americas', 'europe', 'asia', 'sea'];

export const DEFAULT_REGION = 'EUW1';

function isRoutingValue(value: string): value is RoutingValue {
  return ROUTING_VALUES.some((routing) => routing === value);
}

/**
 * Reads the ingestion settings from the environment.
 * Unknown regions or routing values are configuration errors.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): IngestionConfig {
  const region = (env.RIOT_REGION || DEFAULT_REGION).toUpperCase();
  if (!isValidRegion(region)) {
    throw createError('CONFIG_ERROR', `RIOT_REGION "${region}" is not a known platform`, { region });
  }

  const routing = env.RIOT_ROUTING_VALUE?.toLowerCase();
  if (routing !== undefined && !isRoutingValue(routing)) {
    throw createError('CONFIG_ERROR', `RIOT_ROUTING_VALUE "${routing}" is not a known routing value`, { routing });
  }

  return {
    region,
    routingValue: routing,
    debug: env.RIOT_DEBUG === 'true',
    awsRegion: env.AWS_REGION || undefined,
    apiKeySecretName: env.RIOT_API_KEY_SECRET_NAME || undefined,
    apiKey: env.RIOT_API_KEY || undefined,
  };
}

export type SecretFetcher = (secretId: string) => Promise<string | undefined>;

export function secretsManagerFetcher(client: SecretsManagerClient): SecretFetcher {
  return async (secretId) => {
    const response = await client.send(new GetSecretValueCommand({ SecretId: secretId }));
    return response.SecretString;
  };
}

export function createSecretsManagerFetcher(config: IngestionConfig): SecretFetcher {
  return secretsManagerFetcher(new SecretsManagerClient({ region: config.awsRegion }));
}

/**
 * Returns a function resolving the Riot API key. The key comes from Secrets
 * Manager when a secret name is configured, else from RIOT_API_KEY, and is
 * cached once resolved.
 */
export function createApiKeyProvider(config: IngestionConfig, fetchSecret: SecretFetcher): () => Promise<string> {
  // Cache the API key to avoid repeated Secrets Manager calls
  let cachedApiKey: string | null = null;

  return async function getRiotApiKey(): Promise<string> {
    if (cachedApiKey) {
      return cachedApiKey;
    }

    if (config.apiKeySecretName) {
      let secret: string | undefined;
      try {
        secret = await fetchSecret(config.apiKeySecretName);
      } catch (error) {
        console.error('Failed to retrieve Riot API key from Secrets Manager:', error);
        throw createError('CONFIG_ERROR', 'Failed to retrieve API key from Secrets Manager', {
          secretName: config.apiKeySecretName,
        });
      }
      if (!secret) {
        throw createError('CONFIG_ERROR', 'Secret value is empty', { secretName: config.apiKeySecretName });
      }
      cachedApiKey = secret;
      console.log('Retrieved Riot API key from Secrets Manager');
      return cachedApiKey;
    }

    if (config.apiKey) {
      cachedApiKey = config.apiKey;
      return cachedApiKey;
    }

    throw createError('CONFIG_ERROR', 'Neither RIOT_API_KEY_SECRET_NAME nor RIOT_API_KEY is set');
  };
}
