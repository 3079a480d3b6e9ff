/**
 * Provider Registry
 *
 * Keeps workspace providers in registration order and dispatches by lookup.
 */

import type { WorkspaceProvider } from './types.js';

export class ProviderRegistry {
    private readonly providers = new Map<string, WorkspaceProvider>();

    /**
     * @throws {Error} If a provider with the same name is already registered
     */
    register(provider: WorkspaceProvider): void {
        if (this.providers.has(provider.name)) {
            throw new Error(`Workspace provider "${provider.name}" is already registered`);
        }
        this.providers.set(provider.name, provider);
    }

    get(name: string): WorkspaceProvider | undefined {
        return this.providers.get(name);
    }

    list(): WorkspaceProvider[] {
        return [...this.providers.values()];
    }

    /**
     * First provider that claims the project, with the workflow type it reported.
     */
    async detect(projectFile: string): Promise<{ provider: WorkspaceProvider; workflowType: string } | null> {
        for (const provider of this.providers.values()) {
            const workflowType = await provider.classify(projectFile);
            if (workflowType) {
                return { provider, workflowType };
            }
        }
        return null;
    }
}
