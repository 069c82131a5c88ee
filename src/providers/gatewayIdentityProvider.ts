import { injectable } from "inversify";
import { HandshakeInfo, IIdentityProvider } from "./interfaces/IIdentityProvider.interface";

export const USER_ID_HEADER = 'x-user-id';

/**
 * Trusts the user id the gateway attached after authenticating the
 * request: the `x-user-id` header, or `auth.userId` in the handshake.
 */
@injectable()
export class GatewayIdentityProvider implements IIdentityProvider {

    resolveUserId(handshake : HandshakeInfo) : string | null {
        const header = handshake.headers[USER_ID_HEADER];
        const fromHeader = Array.isArray(header) ? header[0] : header;
        if (fromHeader && fromHeader.trim() !== '') {
            return fromHeader.trim();
        }

        const fromAuth = handshake.auth.userId;
        if (typeof fromAuth === 'string' && fromAuth.trim() !== '') {
            return fromAuth.trim();
        }
        if (typeof fromAuth === 'number' && Number.isInteger(fromAuth)) {
            return String(fromAuth);
        }
        return null;
    }
}
