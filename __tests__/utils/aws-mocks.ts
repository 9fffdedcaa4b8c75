import { mockClient } from 'aws-sdk-client-mock';
import { CloudWatchClient } from '@aws-sdk/client-cloudwatch';
import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';

// Create mocked AWS clients
export const mockCloudWatchClient = mockClient(CloudWatchClient);
export const mockSecretsManagerClient = mockClient(SecretsManagerClient);

// Helper to reset all mocks
export function resetAllMocks() {
  mockCloudWatchClient.reset();
  mockSecretsManagerClient.reset();
}

// Helper to setup a Secrets Manager answer with a Cachet token
export function setupSecretsManagerMocks(token = 'secret-test-token') {
  mockSecretsManagerClient.on(GetSecretValueCommand).resolves({
    SecretString: JSON.stringify({ cachet_api_token: token }),
  });
}
