import { ISecretStore } from '../../domain/ports/ISecretStore';
import { SecretSource } from '../../config';
import { EnvSecretStore } from './EnvSecretStore';
import { GcpSecretStore } from './GcpSecretStore';

export { EnvSecretStore } from './EnvSecretStore';
export { GcpSecretStore } from './GcpSecretStore';

export function createSecretStore(source: SecretSource, projectId: string): ISecretStore {
    return source === 'env' ? new EnvSecretStore() : new GcpSecretStore(projectId);
}
