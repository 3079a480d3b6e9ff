import { describe, it, expect, vi } from 'vitest';
import { ProviderRegistry } from './registry.js';
import type { WorkspaceProvider } from './types.js';

function stubProvider(name: string, claims: boolean): WorkspaceProvider {
    return {
        name,
        classify: vi.fn(async () => (claims ? name : null)),
        getChangeLabel: vi.fn(async () => null),
        changeLabelFor: vi.fn(() => null),
        resolve: vi.fn(async (ref: string) => {
            throw new Error(`cannot resolve ${ref}`);
        }),
        preAgent: vi.fn(async () => ({ success: false, error: 'stub' })),
        reattach: vi.fn(async () => ({ success: false, error: 'stub' })),
        postAgent: vi.fn(async () => ({ diffPath: null, meta: {} })),
        submit: vi.fn(async () => null),
    };
}

describe('ProviderRegistry', () => {
    it('looks providers up by name', () => {
        const registry = new ProviderRegistry();
        const gh = stubProvider('gh', true);
        registry.register(gh);

        expect(registry.get('gh')).toBe(gh);
        expect(registry.get('bare')).toBeUndefined();
    });

    it('refuses duplicate names', () => {
        const registry = new ProviderRegistry();
        registry.register(stubProvider('gh', true));

        expect(() => registry.register(stubProvider('gh', false))).toThrow(
            'Workspace provider "gh" is already registered'
        );
    });

    it('detects with the first provider that claims the project', async () => {
        const registry = new ProviderRegistry();
        const bare = stubProvider('bare', false);
        const gh = stubProvider('gh', true);
        const other = stubProvider('other', true);
        registry.register(bare);
        registry.register(gh);
        registry.register(other);

        const detected = await registry.detect('/p/proj/proj.gp');

        expect(detected).toEqual({ provider: gh, workflowType: 'gh' });
        expect(other.classify).not.toHaveBeenCalled();
        expect(registry.list().map((p) => p.name)).toEqual(['bare', 'gh', 'other']);
    });

    it('returns null when no provider claims the project', async () => {
        const registry = new ProviderRegistry();
        registry.register(stubProvider('bare', false));

        expect(await registry.detect('/p/proj/proj.gp')).toBeNull();
    });
});
