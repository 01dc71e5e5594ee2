/**
 * MethodIdentityResolver — Unit Tests
 */
import { describe, it, expect } from 'vitest';
import {
    identityOf, isEligible, collectMethods, eligibleMethods, findMethod,
    allInterfaces, isAssignableTo, findImplementer, resolveImplementation,
} from '../../src/resolution/MethodIdentityResolver.js';
import { defineService, defineInterface } from '../../src/metadata/defineService.js';
import { OBJECT_TYPE, type MethodDescriptor, type ServiceType } from '../../src/domain/ServiceType.js';

function memberOf(type: ServiceType, name: string, kind: MethodDescriptor['kind'] = 'method'): MethodDescriptor {
    const method = type.methods.find(m => m.name === name && m.kind === kind);
    if (!method) throw new Error(`no ${kind} ${name}`);
    return method;
}

// ── Fixtures ─────────────────────────────────────────────

const IReadable = defineInterface('Store.IReadable').method('read', ['string']).build();
const IStore = defineInterface('Store.IStore').extends(IReadable).method('write', ['string', 'Buffer']).build();

const BaseStore = defineService('Store.BaseStore')
    .abstract()
    .method('read', ['string'])
    .method('close')
    .build();

const FileStore = defineService('Store.FileStore')
    .inherits(BaseStore)
    .implements(IStore)
    .ctor(['string'])
    .method('write', ['string', 'Buffer'])
    .method('close')
    .method('open', [], m => m.asStatic())
    .method('flush', [], m => m.visibility('protected'))
    .getter('size')
    .build();

describe('MethodIdentityResolver', () => {
    describe('isEligible', () => {
        it('accepts public instance methods', () => {
            expect(isEligible(memberOf(FileStore, 'write'))).toBe(true);
        });

        it('rejects static, non-public and non-method members', () => {
            expect(isEligible(memberOf(FileStore, 'open'))).toBe(false);
            expect(isEligible(memberOf(FileStore, 'flush'))).toBe(false);
            expect(isEligible(memberOf(FileStore, 'size', 'getter'))).toBe(false);
            expect(isEligible(memberOf(FileStore, 'constructor', 'constructor'))).toBe(false);
        });

        it('rejects members of the universal base', () => {
            expect(OBJECT_TYPE.methods.some(isEligible)).toBe(false);
        });
    });

    it('exposes the precomputed identity', () => {
        const write = memberOf(FileStore, 'write');
        expect(identityOf(write)).toBe(write.identity);
        expect(identityOf(write).key).toBe('Store.FileStore.write["string","Buffer"]');
    });

    describe('collectMethods', () => {
        it('lists own members first and skips overridden base members', () => {
            const keys = collectMethods(FileStore).map(m => m.identity.key);

            expect(keys).toContain('Store.FileStore.close[]');
            expect(keys).not.toContain('Store.BaseStore.close[]');
            expect(keys).toContain('Store.BaseStore.read["string"]');
            expect(keys).toContain('Object.toString[]');
        });

        it('keeps only eligible members in eligibleMethods', () => {
            expect(eligibleMethods(FileStore).map(m => m.identity.key)).toEqual([
                'Store.FileStore.write["string","Buffer"]',
                'Store.FileStore.close[]',
                'Store.BaseStore.read["string"]',
            ]);
        });
    });

    describe('findMethod', () => {
        it('finds own and inherited public methods by signature', () => {
            expect(findMethod(FileStore, 'read', ['string'])?.declaringType).toBe(BaseStore);
            expect(findMethod(FileStore, 'close', [])?.declaringType).toBe(FileStore);
        });

        it('ignores non-public members and wrong parameter lists', () => {
            expect(findMethod(FileStore, 'flush', [])).toBeNull();
            expect(findMethod(FileStore, 'read', ['number'])).toBeNull();
        });
    });

    describe('assignability', () => {
        it('collects interfaces transitively', () => {
            expect([...allInterfaces(FileStore)].map(t => t.name).sort()).toEqual([
                'Store.IReadable',
                'Store.IStore',
            ]);
        });

        it('accepts the type itself, its bases and its interfaces', () => {
            expect(isAssignableTo(FileStore, FileStore)).toBe(true);
            expect(isAssignableTo(FileStore, BaseStore)).toBe(true);
            expect(isAssignableTo(FileStore, IReadable)).toBe(true);
            expect(isAssignableTo(BaseStore, IStore)).toBe(false);
        });
    });

    describe('resolveImplementation', () => {
        const read = memberOf(IReadable, 'read');
        const write = memberOf(IStore, 'write');

        it('maps an interface method to the implementing member', () => {
            expect(resolveImplementation(write, [FileStore])).toBe(memberOf(FileStore, 'write'));
        });

        it('finds implementations inherited from a base class', () => {
            expect(resolveImplementation(read, [FileStore])).toBe(memberOf(BaseStore, 'read'));
        });

        it('skips abstract and unrelated candidates', () => {
            const Unrelated = defineService('Store.Cache').method('read', ['string']).build();

            expect(findImplementer(IReadable, [BaseStore, Unrelated, FileStore])).toBe(FileStore);
            expect(resolveImplementation(read, [BaseStore, Unrelated])).toBeNull();
        });

        it('returns null for a hidden implementation', () => {
            const IHidden = defineInterface('Store.IHidden').method('reset').build();
            const Hidden = defineService('Store.Hidden')
                .implements(IHidden)
                .method('reset', [], m => m.visibility('private'))
                .build();

            expect(resolveImplementation(memberOf(IHidden, 'reset'), [Hidden])).toBeNull();
        });

        it('returns null for methods not declared on an interface', () => {
            expect(resolveImplementation(memberOf(FileStore, 'write'), [FileStore])).toBeNull();
        });
    });
});
