import { GatewayIdentityProvider } from './gatewayIdentityProvider';

describe('GatewayIdentityProvider', () => {
    const provider = new GatewayIdentityProvider();

    it('reads the gateway header first', () => {
        expect(provider.resolveUserId({ headers : { 'x-user-id' : ' user-7 ' }, auth : { userId : 'other' } })).toBe('user-7');
    });

    it('takes the first value of a repeated header', () => {
        expect(provider.resolveUserId({ headers : { 'x-user-id' : ['a', 'b'] }, auth : {} })).toBe('a');
    });

    it('falls back to the handshake auth field', () => {
        expect(provider.resolveUserId({ headers : {}, auth : { userId : 'user-9' } })).toBe('user-9');
        expect(provider.resolveUserId({ headers : { 'x-user-id' : '  ' }, auth : { userId : 12 } })).toBe('12');
    });

    it('rejects a handshake without a usable id', () => {
        expect(provider.resolveUserId({ headers : {}, auth : {} })).toBeNull();
        expect(provider.resolveUserId({ headers : {}, auth : { userId : 1.5 } })).toBeNull();
        expect(provider.resolveUserId({ headers : {}, auth : { userId : '' } })).toBeNull();
    });
});
