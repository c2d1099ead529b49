import { Logger, defaultLogger } from '../../common/logger';
import {
  AccessKey,
  CredentialFields,
  CredentialReference,
  CredentialStore,
  UserRecord
} from '../types';

/**
 * Normalise raw configuration fields into a credential reference.
 * An access key wins over a uid; a secret without an access key is ignored.
 */
export function toCredentialReference(fields: CredentialFields): CredentialReference | undefined {
  if (fields.accessKey) {
    if (fields.secret) {
      return { kind: 'key-pair', accessKeyId: fields.accessKey, secret: fields.secret };
    }
    return { kind: 'access-key', accessKeyId: fields.accessKey };
  }
  if (fields.uid) {
    return { kind: 'user', uid: fields.uid };
  }
  return undefined;
}

export class CredentialResolver {
  constructor(
    private readonly store: CredentialStore,
    private readonly logger: Logger = defaultLogger
  ) {}

  /**
   * Resolve a peer's credential reference into a concrete access key.
   * Returns undefined when nothing usable is found; the caller decides the fallback.
   */
  async resolve(peerLabel: string, reference?: CredentialReference): Promise<AccessKey | undefined> {
    if (!reference) {
      return undefined;
    }

    switch (reference.kind) {
      case 'key-pair':
        return { id: reference.accessKeyId, secret: reference.secret };
      case 'access-key':
        return this.firstKeyOf(peerLabel, () => this.store.userByAccessKeyId(reference.accessKeyId));
      case 'user':
        return this.firstKeyOf(peerLabel, () => this.store.userByIdentity(reference.uid));
    }
  }

  resolveFields(peerLabel: string, fields: CredentialFields): Promise<AccessKey | undefined> {
    return this.resolve(peerLabel, toCredentialReference(fields));
  }

  private async firstKeyOf(
    peerLabel: string,
    lookup: () => Promise<UserRecord | undefined>
  ): Promise<AccessKey | undefined> {
    let user: UserRecord | undefined;
    try {
      user = await lookup();
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(`could not find user info for connection to dest=${peerLabel}: ${errorMessage}`);
      return undefined;
    }

    if (!user) {
      this.logger.error(`could not find user info for connection to dest=${peerLabel}`);
      return undefined;
    }

    // Map iteration order decides "first"; no key is preferred over another
    const first = user.accessKeys.values().next();
    if (first.done) {
      this.logger.error(`user (uid=${user.uid}) has no access keys for dest=${peerLabel}`);
      return undefined;
    }

    return { ...first.value };
  }
}
