/** Authenticated user identity, assigned by the external registration service */
export type UserId = string;

/** Group identifier chosen by the clients' crypto engine; opaque to the relay */
export type GroupId = string;

/** Server-assigned id of one live socket */
export type ConnectionId = string;
