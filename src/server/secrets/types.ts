/**
 * A named source of configuration secrets.
 *
 * `getSecret` resolves the secret value, rejects with `SecretNotFoundError`
 * when the name is absent and with `SecretProviderUnavailableError` when the
 * backing store cannot be reached.
 */
export interface SecretProvider {
  readonly name: string;
  getSecret(name: string): Promise<string>;
}
