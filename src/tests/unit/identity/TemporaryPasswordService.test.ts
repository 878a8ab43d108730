import { SecretsManagerClient, GetSecretValueCommand } from '@aws-sdk/client-secrets-manager';
import { TemporaryPasswordService } from '../../../services/identity/TemporaryPasswordService';
import { SecretAccessError } from '../../../types/OnboardingErrors';
import {
  mockSecretsManagerClient,
  resetAllMocks,
  createGetSecretValueResponse,
  createServiceError,
} from '../../__mocks__/aws-sdk-clients';

jest.mock('@aws-sdk/client-secrets-manager', () => ({
  SecretsManagerClient: jest.fn(() => mockSecretsManagerClient),
  GetSecretValueCommand: jest.fn(),
}));

describe('TemporaryPasswordService', () => {
  let service: TemporaryPasswordService;

  beforeEach(() => {
    resetAllMocks();
    jest.clearAllMocks();
    service = new TemporaryPasswordService(new SecretsManagerClient({}));
  });

  it('should read the shared secret by its fixed id', async () => {
    mockSecretsManagerClient.send.mockResolvedValue(createGetSecretValueResponse('test-password'));

    const password = await service.getTemporaryPassword();

    expect(password).toBe('test-password');
    expect(GetSecretValueCommand).toHaveBeenCalledWith({ SecretId: 'IAMUsersTemporaryPassword' });
  });

  it('should throw SecretAccessError when the secret does not exist', async () => {
    mockSecretsManagerClient.send.mockRejectedValue(
      createServiceError('ResourceNotFoundException', "Secrets Manager can't find the specified secret.")
    );

    const error = await service.getTemporaryPassword().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(SecretAccessError);
    expect(error).toMatchObject({
      error_class: 'NOT_FOUND',
      error_code: 'SECRET_UNAVAILABLE',
      message: "Could not read secret IAMUsersTemporaryPassword: Secrets Manager can't find the specified secret.",
    });
  });

  it('should throw SecretAccessError when the secret has no string value', async () => {
    mockSecretsManagerClient.send.mockResolvedValue({ Name: 'IAMUsersTemporaryPassword' });

    await expect(service.getTemporaryPassword()).rejects.toThrow(
      'Could not read secret IAMUsersTemporaryPassword: secret has no SecretString'
    );
  });

  it('should use a configured secret id', async () => {
    mockSecretsManagerClient.send.mockResolvedValue(createGetSecretValueResponse('test-password'));
    const custom = new TemporaryPasswordService(new SecretsManagerClient({}), 'OtherSecret');

    await custom.getTemporaryPassword();

    expect(GetSecretValueCommand).toHaveBeenCalledWith({ SecretId: 'OtherSecret' });
  });
});
