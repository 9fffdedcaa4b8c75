import { GetSecretValueCommand, SecretsManagerClient } from "@aws-sdk/client-secrets-manager";
import { Config } from "../config";

export interface CachetSecret {
  cachet_api_token: string;
}

interface CachedSecret {
  secret: CachetSecret;
  expiresAt: number;
}

export type TokenProvider = () => Promise<string>;

// Resolves the Cachet API token from the environment, or from Secrets Manager when a secret id is set
export class CachetCredentials {
  private cachedSecret: CachedSecret | null = null;
  private readonly secrets: SecretsManagerClient;

  constructor(
    private readonly staticToken: string | undefined = Config.Instance.cachetApiToken,
    private readonly secretId: string | undefined = Config.Instance.cachetSecretId,
    secrets?: SecretsManagerClient,
  ) {
    this.secrets = secrets ?? new SecretsManagerClient({ region: Config.Instance.awsRegion });
  }

  private nowEpochSeconds(): number {
    return Math.floor(Date.now() / 1000);
  }

  async getToken(): Promise<string> {
    if (this.staticToken) return this.staticToken;
    const secret = await this.loadSecret();
    return secret.cachet_api_token;
  }

  private async loadSecret(): Promise<CachetSecret> {
    // Check if we have a valid cached secret
    const now = this.nowEpochSeconds();
    if (this.cachedSecret && this.cachedSecret.expiresAt > now) {
      return this.cachedSecret.secret;
    }

    if (!this.secretId) {
      throw new Error("Neither CACHET_API_TOKEN nor CACHET_SECRET_ID is set");
    }

    try {
      const res = await this.secrets.send(new GetSecretValueCommand({ SecretId: this.secretId }));
      const secretString = res.SecretString;
      if (!secretString) throw new Error("SecretString empty for Cachet secret");

      const parsed: unknown = JSON.parse(secretString);
      if (
        typeof parsed !== "object" ||
        parsed === null ||
        !("cachet_api_token" in parsed) ||
        typeof parsed.cachet_api_token !== "string" ||
        !parsed.cachet_api_token
      ) {
        throw new Error("Cachet secret missing required field (cachet_api_token)");
      }

      // Cache secret TTL to 5 minutes for security
      this.cachedSecret = {
        secret: { cachet_api_token: parsed.cachet_api_token },
        expiresAt: now + 300,
      };

      return this.cachedSecret.secret;
    } catch (error) {
      // Clear cached secret on error to force refresh next time
      this.cachedSecret = null;
      throw error;
    }
  }

  asProvider(): TokenProvider {
    return () => this.getToken();
  }
}
