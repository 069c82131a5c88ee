export interface HandshakeInfo {
    headers : Record<string, string | string[] | undefined>;
    auth : Record<string, unknown>;
}

/**
 * Supplies the already-verified user behind a connection. The collaboration
 * core never authenticates anyone itself.
 *
 * @interface
 */
export interface IIdentityProvider {

    resolveUserId(
        handshake : HandshakeInfo
    ) : string | null;
}
