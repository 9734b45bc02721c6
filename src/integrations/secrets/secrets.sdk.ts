import { SecretsManagerClient } from "@aws-sdk/client-secrets-manager";

import type { AppConfig } from "../../config/config";

let cachedSecrets: SecretsManagerClient | null = null;

export function getSecretsClient(cfg: AppConfig): SecretsManagerClient {
  if (cachedSecrets) return cachedSecrets;
  cachedSecrets = new SecretsManagerClient({ region: cfg.aws.region });
  return cachedSecrets;
}
