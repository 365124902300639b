import {
    MessageStorage,
    PreferenceStorage,
    IconStorage,
    type Message,
    type Preferences,
    type Icon } from './storage';

/**
 * Implementation of {@link MessageStorage} where messages are held in memory.
 */
export class InMemoryMessageStorage extends MessageStorage {
    private readonly messages : Message[] = [];
    private nextId = 1;

    async post(author : string, body : string) : Promise<Message> {
        const message : Message = {
            id: this.nextId++,
            author: author,
            body: body,
            created: new Date(),
        };
        this.messages.push(message);
        return {...message};
    }

    async list(limit? : number) : Promise<Message[]> {
        const newestFirst = [...this.messages].reverse();
        const messages = limit == undefined ? newestFirst : newestFirst.slice(0, limit);
        return messages.map((message) => ({...message}));
    }
}

/**
 * Implementation of {@link PreferenceStorage} where preferences are held
 * in memory.  A user with nothing saved gets their username as display name
 * and icons shown.
 */
export class InMemoryPreferenceStorage extends PreferenceStorage {
    private readonly preferences = new Map<string, Preferences>();

    async get(username : string) : Promise<Preferences> {
        const preferences = this.preferences.get(username);
        if (preferences) return {...preferences};
        return {displayName: username, showIcons: true};
    }

    async save(username : string, preferences : Preferences) : Promise<void> {
        this.preferences.set(username, {...preferences});
    }
}

/**
 * Implementation of {@link IconStorage} where icons are held in memory.
 */
export class InMemoryIconStorage extends IconStorage {
    private readonly icons = new Map<string, Icon>();

    async get(username : string) : Promise<Icon|undefined> {
        const icon = this.icons.get(username);
        return icon ? {contentType: icon.contentType, data: Buffer.from(icon.data)} : undefined;
    }

    async save(username : string, icon : Icon) : Promise<void> {
        this.icons.set(username, {contentType: icon.contentType, data: Buffer.from(icon.data)});
    }
}
