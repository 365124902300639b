import path from 'path';
import {
    UserStorage,
    SessionStorage,
    PasswordVerifier,
    InMemorySessionStorage,
    LocalPasswordVerifier } from '@palisade/backend';
import { FastifyServer, type FastifyServerOptions } from '@palisade/fastify';
import { MessageStorage, PreferenceStorage, IconStorage } from './storage';
import {
    InMemoryMessageStorage,
    InMemoryPreferenceStorage,
    InMemoryIconStorage } from './inmemorystorage';
import { ForumEndpoints, type ForumEndpointsOptions } from './forumendpoints';

/**
 * Options for {@link createForum}.  Only `userStorage` is required:
 * everything else defaults to an in-memory store or a
 * {@link @palisade/backend!LocalPasswordVerifier}.
 */
export interface ForumOptions extends FastifyServerOptions, ForumEndpointsOptions {
    userStorage : UserStorage,
    sessionStorage? : SessionStorage,
    verifier? : PasswordVerifier,
    messageStorage? : MessageStorage,
    preferenceStorage? : PreferenceStorage,
    iconStorage? : IconStorage,
}

export interface Forum {
    server : FastifyServer,
    endpoints : ForumEndpoints,
}

/**
 * Creates the forum: a {@link FastifyServer} with the forum's pages and
 * API registered and protected.
 *
 * `/messages` and `/preferences` are added to `protectedPageEndpoints`
 * and `/api/icon` to `protectedApiEndpoints`, after any given in `options`.
 */
export function createForum(options : ForumOptions) : Forum {
    const {
        userStorage,
        sessionStorage,
        verifier,
        messageStorage,
        preferenceStorage,
        iconStorage,
        ...serverOptions } = options;

    const server = new FastifyServer(userStorage, {
        verifier: verifier ?? new LocalPasswordVerifier(),
        sessionStorage: sessionStorage ?? new InMemorySessionStorage(),
    }, {
        views: path.join(__dirname, '../views'),
        ...serverOptions,
        protectedPageEndpoints: [...(serverOptions.protectedPageEndpoints ?? []), "/messages", "/preferences"],
        protectedApiEndpoints: [...(serverOptions.protectedApiEndpoints ?? []), "/api/icon"],
    });

    const endpoints = new ForumEndpoints(server,
        messageStorage ?? new InMemoryMessageStorage(),
        preferenceStorage ?? new InMemoryPreferenceStorage(),
        iconStorage ?? new InMemoryIconStorage(),
        serverOptions);

    return {server, endpoints};
}
