import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import { ClusterDefinition } from '../types';
import { logger } from '../utils/logger';

const slurmBackendSchema = z.object({
  kind: z.literal('slurm'),
  baseUrl: z.string().url(),
  apiVersion: z.string().default('v0.0.40'),
  user: z.string().min(1),
  token: z.string().min(1),
  partition: z.string().optional(),
  account: z.string().optional(),
});

const kubernetesBackendSchema = z.object({
  kind: z.literal('kubernetes'),
  baseUrl: z.string().url(),
  namespace: z.string().default('default'),
  token: z.string().min(1),
  serviceAccount: z.string().optional(),
});

const clusterDefinitionSchema = z.object({
  clusterId: z.string().min(1),
  capabilities: z.array(z.string().min(1)).default([]),
  limit: z.number().int().nonnegative().default(0),
  backend: z.discriminatedUnion('kind', [slurmBackendSchema, kubernetesBackendSchema]),
});

export const clustersFileSchema = z
  .object({ clusters: z.array(clusterDefinitionSchema) })
  .superRefine((file, ctx) => {
    const seen = new Set<string>();
    for (const [index, cluster] of file.clusters.entries()) {
      if (seen.has(cluster.clusterId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['clusters', index, 'clusterId'],
          message: `Duplicate clusterId "${cluster.clusterId}"`,
        });
      }
      seen.add(cluster.clusterId);
    }
  });

/** Validates an already-parsed clusters document. */
export const parseClusterDefinitions = (raw: unknown): ClusterDefinition[] => {
  const parsed = clustersFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new Error(`Invalid cluster configuration:\n  ${issues.join('\n  ')}`);
  }
  return parsed.data.clusters;
};

/**
 * Reads the cluster definitions file (JSON) relative to the working directory.
 */
export async function loadClusterDefinitions(file: string): Promise<ClusterDefinition[]> {
  const fullPath = path.resolve(file);
  const content = await fs.readFile(fullPath, 'utf8');
  const clusters = parseClusterDefinitions(JSON.parse(content));
  logger.info(`🗂️ Loaded ${clusters.length} cluster definition(s) from ${fullPath}`);
  return clusters;
}
