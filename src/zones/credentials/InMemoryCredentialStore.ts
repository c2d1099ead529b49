import { AccessKey, CredentialStore, UserRecord } from '../types';

export class InMemoryCredentialStore implements CredentialStore {
  private users = new Map<string, UserRecord>();
  private keyOwners = new Map<string, string>();

  addUser(uid: string, keys: AccessKey[]): UserRecord {
    if (this.users.has(uid)) {
      throw new Error(`User ${uid} already exists`);
    }

    const accessKeys = new Map<string, AccessKey>();
    for (const key of keys) {
      if (this.keyOwners.has(key.id)) {
        throw new Error(`Access key ${key.id} already belongs to user ${this.keyOwners.get(key.id)}`);
      }
      accessKeys.set(key.id, { ...key });
      this.keyOwners.set(key.id, uid);
    }

    const user: UserRecord = { uid, accessKeys };
    this.users.set(uid, user);
    return user;
  }

  removeUser(uid: string): boolean {
    const user = this.users.get(uid);
    if (!user) return false;

    for (const keyId of user.accessKeys.keys()) {
      this.keyOwners.delete(keyId);
    }
    this.users.delete(uid);
    return true;
  }

  async userByAccessKeyId(accessKeyId: string): Promise<UserRecord | undefined> {
    const uid = this.keyOwners.get(accessKeyId);
    return uid === undefined ? undefined : this.users.get(uid);
  }

  async userByIdentity(uid: string): Promise<UserRecord | undefined> {
    return this.users.get(uid);
  }

  clear(): void {
    this.users.clear();
    this.keyOwners.clear();
  }
}
