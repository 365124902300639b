import { Capability } from '@palisade/common';
import { InMemoryUserStorage, LocalPasswordVerifier } from '@palisade/backend';

export async function getTestUserStorage(verifier : LocalPasswordVerifier) : Promise<InMemoryUserStorage> {
    const userStorage = new InMemoryUserStorage();
    await userStorage.createUser({
            username: "bob",
            capabilities: [Capability.User],
        }, await verifier.createPasswordHash("bobPass123"));
    await userStorage.createUser({
            username: "alice",
            capabilities: [Capability.User],
        }, await verifier.createPasswordHash("alicePass123"));
    // can log in but holds no capabilities
    await userStorage.createUser({
            username: "mallory",
            capabilities: [],
        }, await verifier.createPasswordHash("malloryPass123"));
    return userStorage;
}
