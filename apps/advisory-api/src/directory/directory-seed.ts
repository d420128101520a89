// Import fs promises API to read the seed file
import { readFile } from 'node:fs/promises';
// Import zod for runtime validation of the seed file
import { z } from 'zod';
// Import permission catalog
import { PERMISSION_KINDS } from '../iam/permissions/permission-kind';
// Import role enum
import { Role } from '../iam/roles/role.enum';
// Import snapshot type
import type { DirectorySnapshot } from './directory.types';

// Positive integer identifiers
const id = z.number().int().positive();

/**
 * Seed file schema
 * Unknown roles or grant names are rejected so a typo never silently drops a permission
 */
const seedSchema = z.object({
  users: z
    .array(
      z.object({
        id,
        email: z.string().email(),
        firstName: z.string().default(''),
        lastName: z.string().default(''),
        role: z.nativeEnum(Role),
        customGrants: z.array(z.enum(PERMISSION_KINDS)).default([]),
        active: z.boolean().default(true)
      })
    )
    .default([]),
  clients: z
    .array(
      z.object({
        id,
        userId: id,
        assignedEmployeeId: id.nullable().default(null)
      })
    )
    .default([]),
  employees: z.array(z.object({ id, userId: id })).default([]),
  investments: z.array(z.object({ id, clientId: id })).default([])
});

/**
 * Check that every cross-reference points at an existing record
 * @param snapshot - Schema-valid snapshot
 * @returns Human-readable problems (empty when consistent)
 */
function findDanglingReferences(snapshot: DirectorySnapshot): string[] {
  const problems: string[] = [];
  const userIds = new Set(snapshot.users.map((u) => u.id));
  const clientIds = new Set(snapshot.clients.map((c) => c.id));
  const employeeIds = new Set(snapshot.employees.map((e) => e.id));

  for (const client of snapshot.clients) {
    if (!userIds.has(client.userId)) problems.push(`client ${client.id} references unknown user ${client.userId}`);
    if (client.assignedEmployeeId !== null && !employeeIds.has(client.assignedEmployeeId)) {
      problems.push(`client ${client.id} references unknown employee ${client.assignedEmployeeId}`);
    }
  }
  for (const employee of snapshot.employees) {
    if (!userIds.has(employee.userId)) problems.push(`employee ${employee.id} references unknown user ${employee.userId}`);
  }
  for (const investment of snapshot.investments) {
    if (!clientIds.has(investment.clientId)) {
      problems.push(`investment ${investment.id} references unknown client ${investment.clientId}`);
    }
  }
  return problems;
}

/**
 * Validate raw seed content
 * @param raw - Parsed JSON value
 * @returns Directory snapshot
 * @throws Error naming the invalid paths or dangling references
 */
export function parseDirectorySeed(raw: unknown): DirectorySnapshot {
  const result = seedSchema.safeParse(raw);
  if (!result.success) {
    const paths = Array.from(new Set(result.error.issues.map((issue) => issue.path.join('.') || '(root)')));
    throw new Error(`Invalid directory seed. Invalid entries: ${paths.join(', ')}.`);
  }

  const snapshot: DirectorySnapshot = result.data;
  const problems = findDanglingReferences(snapshot);
  if (problems.length > 0) {
    throw new Error(`Invalid directory seed. ${problems.join('; ')}.`);
  }
  return snapshot;
}

/**
 * Read and validate a seed file
 * @param path - Path of the JSON seed file
 * @returns Directory snapshot
 * @throws Error when the file cannot be read, is not JSON, or fails validation
 */
export async function loadDirectorySeed(path: string): Promise<DirectorySnapshot> {
  const text = await readFile(path, 'utf8');

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err: unknown) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`Invalid directory seed. ${path} is not valid JSON: ${reason}`);
  }

  return parseDirectorySeed(raw);
}
