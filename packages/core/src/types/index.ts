export type { UserId, GroupId, ConnectionId } from './ids.js';
