// Message shapes the router interprets.
//
// Requests arrive as decoded plain objects. Only the version sub-message and
// the identifier sub-fields are read here; everything else passes through to
// the provider untouched.

import { z } from 'zod';

// ---------------------------------------------------------------------------
// Schemas
// ---------------------------------------------------------------------------

export const VersionSchema = z.object({
  major: z.number().int().min(0),
  minor: z.number().int().min(0),
  patch: z.number().int().min(0),
});

export type Version = z.infer<typeof VersionSchema>;

const StringMapSchema = z.record(z.string(), z.string());

const IdentifierSchema = z.object({ values: StringMapSchema.nullish() }).nullish();

const VersionFieldSchema = z.object({ version: VersionSchema.nullish() });
const NameFieldSchema = z.object({ name: z.string().nullish() });
const VolumeIdFieldSchema = z.object({ volumeId: IdentifierSchema });
const NodeIdFieldSchema = z.object({ nodeId: IdentifierSchema });

export const SupportedVersionsReplySchema = z.object({
  result: z.object({ supportedVersions: z.array(VersionSchema) }).nullish(),
  error: z.record(z.string(), z.unknown()).nullish(),
});

const ErrorDetailSchema = z.object({
  errorCode: z.string(),
  errorDescription: z.string(),
});

// ---------------------------------------------------------------------------
// Accessors
// ---------------------------------------------------------------------------

/** Result of inspecting an identifier sub-message (volume id, node id). */
export type IdentifierPresence =
  | { status: 'missing' }
  | { status: 'empty' }
  | { status: 'present'; values: Record<string, string> };

export function readVersion(request: object): Version | null {
  const parsed = VersionFieldSchema.safeParse(request);
  return parsed.success ? (parsed.data.version ?? null) : null;
}

export function readName(request: object): string {
  const parsed = NameFieldSchema.safeParse(request);
  return parsed.success ? (parsed.data.name ?? '') : '';
}

export function inspectVolumeId(request: object): IdentifierPresence {
  const parsed = VolumeIdFieldSchema.safeParse(request);
  return presence(parsed.success ? parsed.data.volumeId : null);
}

export function inspectNodeId(request: object): IdentifierPresence {
  const parsed = NodeIdFieldSchema.safeParse(request);
  return presence(parsed.success ? parsed.data.nodeId : null);
}

function presence(
  identifier: { values?: Record<string, string> | null } | null | undefined
): IdentifierPresence {
  if (!identifier) return { status: 'missing' };
  const values = identifier.values ?? {};
  if (Object.keys(values).length === 0) return { status: 'empty' };
  return { status: 'present', values };
}

export function formatVersion(version: Version): string {
  return `${version.major}.${version.minor}.${version.patch}`;
}

export function versionsEqual(a: Version, b: Version): boolean {
  return a.major === b.major && a.minor === b.minor && a.patch === b.patch;
}

/**
 * Render an `Error` payload as "CODE: description" using the first error
 * detail set in the oneof.
 */
export function describeProtocolError(error: Record<string, unknown>): string {
  for (const detail of Object.values(error)) {
    const parsed = ErrorDetailSchema.safeParse(detail);
    if (parsed.success) {
      return `${parsed.data.errorCode}: ${parsed.data.errorDescription}`;
    }
  }
  return 'unknown error';
}
