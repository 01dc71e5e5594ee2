/**
 * MethodIdentity — Unit Tests
 */
import { describe, it, expect } from 'vitest';
import {
    createIdentity, identityKey, sameSignature, identitiesEqual,
} from '../../src/domain/MethodIdentity.js';

describe('MethodIdentity', () => {
    it('renders type, method and JSON parameter list', () => {
        expect(identityKey('Shop.OrderService', 'cancel', ['string', 'number']))
            .toBe('Shop.OrderService.cancel["string","number"]');
        expect(identityKey('Shop.OrderService', 'ping', [])).toBe('Shop.OrderService.ping[]');
    });

    it('keeps overloads apart', () => {
        const one = createIdentity('Shop.OrderService', 'cancel', ['string']);
        const two = createIdentity('Shop.OrderService', 'cancel', ['string', 'number']);
        expect(one.key).not.toBe(two.key);
        expect(identitiesEqual(one, two)).toBe(false);
    });

    it('does not let a comma inside a type name split a parameter', () => {
        const generic = identityKey('Cache', 'put', ['Map<string, number>']);
        const split = identityKey('Cache', 'put', ['Map<string', ' number>']);
        expect(generic).not.toBe(split);
    });

    it('freezes the identity and its parameter list', () => {
        const params = ['string'];
        const identity = createIdentity('A.B', 'run', params);
        params.push('number');

        expect(identity.parameterTypes).toEqual(['string']);
        expect(Object.isFrozen(identity)).toBe(true);
        expect(Object.isFrozen(identity.parameterTypes)).toBe(true);
    });

    it('compares signatures without the owning type', () => {
        const iface = createIdentity('Shop.IOrderService', 'cancel', ['string']);
        const impl = createIdentity('Shop.OrderService', 'cancel', ['string']);

        expect(sameSignature(iface, impl)).toBe(true);
        expect(identitiesEqual(iface, impl)).toBe(false);
        expect(identitiesEqual(impl, createIdentity('Shop.OrderService', 'cancel', ['string']))).toBe(true);
    });
});
