import { z } from 'zod';

export const ClusterSchema = z.object({
  name: z.string().trim().min(1),
  siteIds: z.array(z.number().int()),
});

export const ClusterDefinitionSchema = z
  .array(ClusterSchema)
  .min(1)
  .refine(clusters => new Set(clusters.map(c => c.name)).size === clusters.length, {
    message: 'Cluster names must be unique',
  });

export type Cluster = Readonly<z.infer<typeof ClusterSchema>>;
export type ClusterDefinition = readonly Cluster[];
