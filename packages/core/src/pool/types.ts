/**
 * Workspace Pool Types
 *
 * Each project has a fixed range of numbered workspace slots. Claims are
 * stored in `<name>.workspaces.json` beside the project file.
 */

import { z } from 'zod';

export const SlotClaimSchema = z.object({
    slot: z.number().int().nonnegative(),
    /** Owner tag, e.g. `gh-octocat/hello` or `submit-my_change` */
    workflow: z.string().min(1),
    pid: z.number().int(),
    changeName: z.string().nullable(),
    /** Pinned claims are never reclaimed, even if the owner process is gone */
    pinned: z.boolean(),
    claimedAt: z.string(),
});

export type SlotClaim = z.infer<typeof SlotClaimSchema>;

export const PoolFileSchema = z.object({
    version: z.literal(1),
    claims: z.record(z.string(), SlotClaimSchema),
    updatedAt: z.string(),
});

export type PoolFile = z.infer<typeof PoolFileSchema>;

export interface ClaimOptions {
    pinned?: boolean;
}
