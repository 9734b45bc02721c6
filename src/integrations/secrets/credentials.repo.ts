import { GetSecretValueCommand, type SecretsManagerClient } from "@aws-sdk/client-secrets-manager";
import { z } from "zod";

import { ConfigurationError } from "../../domain/errors";
import type { CredentialProvider } from "../../domain/ports";
import type { SpotifyCredentials } from "../spotify/spotify.sdk";

const secretMap = z.record(z.string(), z.string());

/** JSON key/value secrets from Secrets Manager, fetched once per provider. */
export class SecretsManagerCredentialProvider implements CredentialProvider {
  private readonly cache = new Map<string, Record<string, string>>();

  constructor(private readonly client: SecretsManagerClient) {}

  async getSecret(name: string): Promise<Record<string, string>> {
    const cached = this.cache.get(name);
    if (cached) return cached;

    const res = await this.client.send(new GetSecretValueCommand({ SecretId: name }));
    if (!res.SecretString) throw new ConfigurationError(`secret "${name}" has no SecretString`, { secret: name });

    let json: unknown;
    try {
      json = JSON.parse(res.SecretString);
    } catch (err) {
      throw new ConfigurationError(`secret "${name}" is not valid JSON`, { secret: name, reason: String(err) });
    }
    const parsed = secretMap.safeParse(json);
    if (!parsed.success) {
      throw new ConfigurationError(`secret "${name}" must be a flat map of strings`, { secret: name });
    }

    this.cache.set(name, parsed.data);
    return parsed.data;
  }
}

/** Catalog client credentials stored under spotify_client_id / spotify_client_secret. */
export async function getSpotifyCredentials(provider: CredentialProvider, secretName: string): Promise<SpotifyCredentials> {
  const secret = await provider.getSecret(secretName);
  const clientId = secret["spotify_client_id"];
  const clientSecret = secret["spotify_client_secret"];
  if (!clientId || !clientSecret) {
    throw new ConfigurationError(`secret "${secretName}" lacks spotify_client_id or spotify_client_secret`, {
      secret: secretName,
    });
  }
  return { clientId, clientSecret };
}
