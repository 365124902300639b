/** A message posted to the board */
export interface Message {
    id : number,

    /** Username of the poster, taken from the session, never the form */
    author : string,
    body : string,
    created : Date,
}

/** Per-user display settings */
export interface Preferences {
    displayName : string,
    showIcons : boolean,
}

/** A profile icon, stored as uploaded */
export interface Icon {
    contentType : string,
    data : Buffer,
}

/**
 * Base class for storing board messages.
 */
export abstract class MessageStorage {

    /**
     * Stores a new message and returns it with its id and time.
     */
    abstract post(author : string, body : string) : Promise<Message>;

    /**
     * Returns messages, newest first.
     * @param limit at most this many.  All if undefined
     */
    abstract list(limit? : number) : Promise<Message[]>;
}

/**
 * Base class for storing user preferences.
 */
export abstract class PreferenceStorage {

    /** Returns the user's preferences, or the defaults if they have none saved */
    abstract get(username : string) : Promise<Preferences>;

    abstract save(username : string, preferences : Preferences) : Promise<void>;
}

/**
 * Base class for storing profile icons.
 */
export abstract class IconStorage {
    abstract get(username : string) : Promise<Icon|undefined>;

    /** Replaces any icon the user already has */
    abstract save(username : string, icon : Icon) : Promise<void>;
}
