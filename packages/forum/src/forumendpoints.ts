import {
    type FastifyRequest,
    type FastifyReply } from 'fastify';
import {
    PalisadeError,
    ErrorCode,
    PalisadeLogger,
    j } from '@palisade/common';
import { numberParameter } from '@palisade/backend';
import {
    FastifyServer,
    FastifySessionServer,
    bodyField,
    type CsrfBodyType } from '@palisade/fastify';
import { MessageStorage, PreferenceStorage, IconStorage } from './storage';

const ICON_TYPES = ["image/png", "image/jpeg", "image/gif"];

// leading bytes of each accepted image format
const ICON_SIGNATURES : {[contentType:string]: number[]} = {
    "image/png": [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a],
    "image/jpeg": [0xff, 0xd8, 0xff],
    "image/gif": [0x47, 0x49, 0x46, 0x38],
};

/**
 * Options for {@link ForumEndpoints}
 */
export interface ForumEndpointsOptions {

    /** Longest message accepted, in characters.  Default 2000.
     * `PALISADE_MAX_MESSAGE_LENGTH` */
    maxMessageLength? : number,

    /** Longest display name accepted, in characters.  Default 50 */
    maxDisplayNameLength? : number,

    /** Largest icon accepted, in bytes.  Default 256 KiB.
     * `PALISADE_MAX_ICON_SIZE` */
    maxIconSize? : number,

    /** Number of messages shown on the board.  Default 100 */
    boardSize? : number,
}

/////////////////////////////////////////////////////////////////////
// Fastify data types

export interface MessageBodyType extends CsrfBodyType {
    body? : string,
}

export interface PreferencesBodyType extends CsrfBodyType {
    displayName? : string,
    showIcons? : string,
}

export interface IconParamType {
    username : string,
}

/**
 * Returns the media type of a `Content-Type` header without its parameters,
 * lower case.
 */
export function mediaType(contentType : string|undefined) : string|undefined {
    if (!contentType) return undefined;
    return contentType.split(";")[0].trim().toLowerCase();
}

/**
 * True if `data` starts with the signature of the given image type.
 */
export function matchesSignature(contentType : string, data : Buffer) : boolean {
    const signature = ICON_SIGNATURES[contentType];
    if (!signature || data.length < signature.length) return false;
    return signature.every((byte, i) => data[i] == byte);
}

/**
 * The forum's own endpoints.  Authentication and CSRF checks are done by
 * the {@link FastifySessionServer} gate before any handler here runs:
 * `/messages` and `/preferences` must be listed as protected pages and
 * `/api/icon` as a protected API endpoint.
 *
 * | Method | Endpoint          | Access                      |
 * | ------ | ----------------- | --------------------------- |
 * | GET    | /                 | public                      |
 * | POST   | /messages         | logged in, CSRF form field  |
 * | GET    | /preferences      | logged in                   |
 * | POST   | /preferences      | logged in, CSRF form field  |
 * | POST   | /api/icon         | logged in, CSRF header      |
 * | GET    | /icon/:username   | public                      |
 */
export class ForumEndpoints {
    private readonly sessionServer : FastifySessionServer;
    private readonly messageStorage : MessageStorage;
    private readonly preferenceStorage : PreferenceStorage;
    private readonly iconStorage : IconStorage;

    readonly maxMessageLength : number;
    readonly maxDisplayNameLength : number;
    readonly maxIconSize : number;
    readonly boardSize : number;

    constructor(server : FastifyServer,
        messageStorage : MessageStorage,
        preferenceStorage : PreferenceStorage,
        iconStorage : IconStorage,
        options : ForumEndpointsOptions = {}) {

        this.sessionServer = server.sessionServer;
        this.messageStorage = messageStorage;
        this.preferenceStorage = preferenceStorage;
        this.iconStorage = iconStorage;
        this.maxMessageLength = numberParameter(options.maxMessageLength, "MAX_MESSAGE_LENGTH", 2000);
        this.maxDisplayNameLength = options.maxDisplayNameLength ?? 50;
        this.maxIconSize = numberParameter(options.maxIconSize, "MAX_ICON_SIZE", 256*1024);
        this.boardSize = options.boardSize ?? 100;

        server.app.addContentTypeParser(ICON_TYPES,
            { parseAs: 'buffer', bodyLimit: this.maxIconSize },
            async (_request : FastifyRequest, body : Buffer) => body);

        this.addBoardEndpoints();
        this.addPreferencesEndpoints();
        this.addIconEndpoints();
    }

    private addBoardEndpoints() {
        this.sessionServer.app.get('/',
            async (request : FastifyRequest, reply : FastifyReply) => {
            PalisadeLogger.logger.info(j({
                msg: "Page visit",
                method: 'GET',
                url: '/',
                ip: request.ip,
                user: request.user?.username
            }));
            return reply.view("index.njk", await this.boardData(request));
        });

        this.sessionServer.app.post('/messages',
            async (request : FastifyRequest<{ Body: MessageBodyType }>,
                reply : FastifyReply) => {
            PalisadeLogger.logger.info(j({
                msg: "Page visit",
                method: 'POST',
                url: '/messages',
                ip: request.ip,
                user: request.user?.username
            }));
            try {
                const message = await this.postMessage(request);
                PalisadeLogger.logger.info(j({msg: "Message posted", user: message.author, messageId: message.id}));
                return reply.redirect('/');
            } catch (e) {
                return this.sessionServer.handleError(e, request, reply, (reply, error) => {
                    return this.sessionServer.sendPageError(reply, error);
                });
            }
        });
    }

    private addPreferencesEndpoints() {
        this.sessionServer.app.get('/preferences',
            async (request : FastifyRequest, reply : FastifyReply) => {
            PalisadeLogger.logger.info(j({
                msg: "Page visit",
                method: 'GET',
                url: '/preferences',
                ip: request.ip,
                user: request.user?.username
            }));
            const user = this.requireUser(request);
            return reply.view("preferences.njk", {
                user: user,
                csrfToken: request.csrfToken,
                preferences: await this.preferenceStorage.get(user.username),
            });
        });

        this.sessionServer.app.post('/preferences',
            async (request : FastifyRequest<{ Body: PreferencesBodyType }>,
                reply : FastifyReply) => {
            PalisadeLogger.logger.info(j({
                msg: "Page visit",
                method: 'POST',
                url: '/preferences',
                ip: request.ip,
                user: request.user?.username
            }));
            const user = this.requireUser(request);
            const displayName = (bodyField(request.body, "displayName") ?? "").trim();
            const showIcons = bodyField(request.body, "showIcons") != undefined;
            const csrfToken = request.session ?
                this.sessionServer.sessionManager.csrfFormValue(request.session) : undefined;

            const length = [...displayName].length;
            if (length == 0 || length > this.maxDisplayNameLength) {
                return reply.status(400).view("preferences.njk", {
                    user: user,
                    csrfToken: csrfToken,
                    preferences: {displayName, showIcons},
                    errorMessage: `Display name must be between 1 and ${this.maxDisplayNameLength} characters`,
                });
            }
            await this.preferenceStorage.save(user.username, {displayName, showIcons});
            return reply.view("preferences.njk", {
                user: user,
                csrfToken: csrfToken,
                preferences: {displayName, showIcons},
                message: "Your preferences have been saved",
            });
        });
    }

    private addIconEndpoints() {
        this.sessionServer.app.post('/api/icon',
            async (request : FastifyRequest, reply : FastifyReply) => {
            PalisadeLogger.logger.info(j({
                msg: "API visit",
                method: 'POST',
                url: '/api/icon',
                ip: request.ip,
                user: request.user?.username
            }));
            try {
                const user = this.requireUser(request);
                const contentType = mediaType(request.headers["content-type"]);
                if (!contentType || !ICON_TYPES.includes(contentType) || !Buffer.isBuffer(request.body)) {
                    throw new PalisadeError(ErrorCode.UnsupportedMediaType,
                        "Icon must be a PNG, JPEG or GIF image");
                }
                if (!matchesSignature(contentType, request.body)) {
                    throw new PalisadeError(ErrorCode.BadRequest,
                        "Icon data is not a valid " + contentType + " image");
                }
                await this.iconStorage.save(user.username, {contentType, data: request.body});
                PalisadeLogger.logger.info(j({msg: "Icon uploaded", user: user.username, size: request.body.length}));
                return reply.header('Content-Type', 'application/json; charset=utf-8')
                    .send({ok: true, url: "/icon/" + encodeURIComponent(user.username)});
            } catch (e) {
                return this.sessionServer.handleError(e, request, reply, (reply, error) => {
                    return this.sessionServer.sendJsonError(reply, error);
                });
            }
        });

        this.sessionServer.app.get('/icon/:username',
            async (request : FastifyRequest<{ Params: IconParamType }>,
                reply : FastifyReply) => {
            const icon = await this.iconStorage.get(request.params.username);
            if (!icon) {
                return this.sessionServer.sendPageError(reply, new PalisadeError(ErrorCode.NotFound));
            }
            return reply.type(icon.contentType).send(icon.data);
        });
    }

    /**
     * Stores a message from the `body` field, attributed to the logged-in
     * user.
     * @throws {@link @palisade/common!PalisadeError} with `BadRequest` if
     *         the message is empty or too long
     */
    private async postMessage(request : FastifyRequest) {
        const user = this.requireUser(request);
        const body = (bodyField(request.body, "body") ?? "").trim();
        const length = [...body].length;
        if (length == 0 || length > this.maxMessageLength) {
            throw new PalisadeError(ErrorCode.BadRequest,
                `Message must be between 1 and ${this.maxMessageLength} characters`);
        }
        return await this.messageStorage.post(user.username, body);
    }

    private async boardData(request : FastifyRequest) {
        const messages = await this.messageStorage.list(this.boardSize);
        const authors = [...new Set(messages.map((message) => message.author))];
        const displayNames = new Map<string, string>();
        for (const author of authors) {
            displayNames.set(author, (await this.preferenceStorage.get(author)).displayName);
        }
        const showIcons = request.user ?
            (await this.preferenceStorage.get(request.user.username)).showIcons : true;
        return {
            user: request.user,
            csrfToken: request.csrfToken,
            showIcons: showIcons,
            messages: messages.map((message) => ({
                id: message.id,
                author: message.author,
                displayName: displayNames.get(message.author) ?? message.author,
                body: message.body,
                created: message.created.toISOString(),
                icon: "/icon/" + encodeURIComponent(message.author),
            })),
        };
    }

    /**
     * Returns the logged-in user.  The gate has already rejected anonymous
     * callers for protected routes, so this only throws if a route was
     * left off the protected list.
     */
    private requireUser(request : FastifyRequest) {
        if (!request.user) {
            PalisadeLogger.logger.error(j({msg: "Unprotected route reached without a user", url: request.url}));
            throw new PalisadeError(ErrorCode.Forbidden);
        }
        return request.user;
    }
}
