/**
 * Port for credential lookup.
 */
export interface ISecretStore {
    /**
     * @throws SecretNotFoundError when the secret does not exist or is empty
     */
    getSecret(name: string): Promise<string>;
}
