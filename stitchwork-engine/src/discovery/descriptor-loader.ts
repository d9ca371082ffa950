/**
 * Descriptor Loader
 *
 * Reads node descriptors produced by an external discovery step (a CST
 * walker, a file lister) from a JSON or YAML manifest.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { GraphDefinitionError } from '../errors.js';
import { ERROR_POLICIES, type BuildGraphOptions, type NodeDescriptor } from '../types/index.js';

export type ManifestFormat = 'json' | 'yaml';

const descriptorSchema = z
  .object({
    id: z.string().min(1),
    name: z.string().optional(),
    kind: z.string().optional(),
    filePath: z.string().min(1).optional(),
    startByte: z.number().int().nonnegative(),
    endByte: z.number().int().nonnegative(),
    text: z.string().optional(),
    parentId: z.string().min(1).optional(),
    dependsOn: z.array(z.string().min(1)).optional(),
    priority: z.number().optional(),
    errorPolicy: z.enum(ERROR_POLICIES).optional(),
    metadata: z.record(z.unknown()).optional(),
  })
  .refine((descriptor) => descriptor.endByte >= descriptor.startByte, {
    message: 'endByte must not be before startByte',
    path: ['endByte'],
  });

const manifestSchema = z.object({
  siblingOrder: z.enum(['parallel', 'sequential']).optional(),
  nodes: z.array(descriptorSchema),
});

export interface DescriptorManifest {
  descriptors: NodeDescriptor[];
  options: BuildGraphOptions;
}

/**
 * Parse manifest text.
 *
 * @throws GraphDefinitionError for syntax errors or descriptors of the wrong shape
 */
export function parseDescriptorManifest(raw: string, format: ManifestFormat): DescriptorManifest {
  let document: unknown;
  try {
    document = format === 'json' ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    throw new GraphDefinitionError(
      `Descriptor manifest is not valid ${format.toUpperCase()}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  // A bare list is accepted as the node list
  const candidate = Array.isArray(document) ? { nodes: document } : document;
  const parsed = manifestSchema.safeParse(candidate);
  if (!parsed.success) {
    const problems = parsed.error.issues.slice(0, 5).map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new GraphDefinitionError(`Invalid descriptor manifest: ${problems.join('; ')}`, {
      issues: parsed.error.issues.length,
    });
  }

  return {
    descriptors: parsed.data.nodes,
    options: parsed.data.siblingOrder ? { siblingOrder: parsed.data.siblingOrder } : {},
  };
}

export function formatForPath(filePath: string): ManifestFormat {
  const extension = path.extname(filePath).toLowerCase();
  return extension === '.yaml' || extension === '.yml' ? 'yaml' : 'json';
}

/**
 * Read and parse a manifest file; the format follows the file extension.
 */
export async function loadDescriptorManifest(filePath: string): Promise<DescriptorManifest> {
  const raw = await fs.readFile(filePath, 'utf-8');
  return parseDescriptorManifest(raw, formatForPath(filePath));
}
