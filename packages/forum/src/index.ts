export { createForum } from './forum';
export type { ForumOptions, Forum } from './forum';
export { ForumEndpoints, mediaType, matchesSignature } from './forumendpoints';
export type { ForumEndpointsOptions, MessageBodyType, PreferencesBodyType, IconParamType } from './forumendpoints';
export { MessageStorage, PreferenceStorage, IconStorage } from './storage';
export type { Message, Preferences, Icon } from './storage';
export { InMemoryMessageStorage, InMemoryPreferenceStorage, InMemoryIconStorage } from './inmemorystorage';
