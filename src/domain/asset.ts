/**
 * Asset domain model.
 *
 * Assets are immutable, typed units of data flowing through runs. Their
 * ids are content-addressed: the same kind and payload always produce the
 * same id, and a changed payload is a new asset.
 *
 * System and Method payloads have fixed schemas; Params, Results and
 * Artifact payloads are open key/value bags.
 */

import { z } from 'zod';
import { EngineError, assetIdMismatchError, validationError } from './errors';
import { contentHash } from './identity';

/** Asset kinds. */
export enum AssetKind {
  System = 'System',
  Method = 'Method',
  Params = 'Params',
  Results = 'Results',
  Artifact = 'Artifact',
}

const ID_PREFIX: Record<AssetKind, string> = {
  [AssetKind.System]: 'S',
  [AssetKind.Method]: 'M',
  [AssetKind.Params]: 'P',
  [AssetKind.Results]: 'R',
  [AssetKind.Artifact]: 'A',
};

const Vec3Schema = z.tuple([z.number(), z.number(), z.number()]);

/** An atomic structure with a periodic cell. */
export const SystemPayloadSchema = z
  .object({
    atoms: z.array(z.object({ el: z.string().min(1), pos: Vec3Schema }).passthrough()),
    lattice: z.tuple([Vec3Schema, Vec3Schema, Vec3Schema]),
    pbc: z.tuple([z.boolean(), z.boolean(), z.boolean()]),
  })
  .passthrough();

/** A computational method configuration. */
export const MethodPayloadSchema = z
  .object({
    family: z.enum(['DFT', 'MD', 'LD', 'ML', 'QM']),
    code: z.string().min(1),
    device: z.enum(['CPU', 'GPU', 'TPU']).optional(),
  })
  .passthrough();

export type SystemPayload = z.infer<typeof SystemPayloadSchema>;
export type MethodPayload = z.infer<typeof MethodPayloadSchema>;
export type OpenPayload = Record<string, unknown>;

/** Optional fields shared by every asset kind. */
export interface AssetExtras {
  /** Field name -> physical unit. */
  units?: Record<string, string>;
  /** Pointer to out-of-band content. */
  uri?: string;
  hash?: string;
}

interface AssetBase<K extends AssetKind, P> extends AssetExtras {
  kind: K;
  id: string;
  payload: P;
}

export type SystemAsset = AssetBase<AssetKind.System, SystemPayload>;
export type MethodAsset = AssetBase<AssetKind.Method, MethodPayload>;
export type OpenAssetKind = AssetKind.Params | AssetKind.Results | AssetKind.Artifact;
export type OpenAsset = AssetBase<OpenAssetKind, OpenPayload>;

export type Asset = SystemAsset | MethodAsset | OpenAsset;

/** Persisted / transported form of an asset. */
export interface AssetWire {
  type: string;
  id: string;
  payload: Record<string, unknown>;
  units?: Record<string, string>;
  uri?: string;
  hash?: string;
}

export const AssetWireSchema = z.object({
  type: z.nativeEnum(AssetKind),
  id: z.string().min(1).optional(),
  payload: z.record(z.unknown()),
  units: z.record(z.string()).optional(),
  uri: z.string().optional(),
  hash: z.string().optional(),
});

export function isAssetKind(value: unknown): value is AssetKind {
  return typeof value === 'string' && Object.values<string>(AssetKind).includes(value);
}

/** Content-addressed id: kind prefix + first six hex chars of the payload hash. */
export function assetId(kind: AssetKind, payload: unknown): string {
  return `${ID_PREFIX[kind]}${contentHash(payload).slice(0, 6)}`;
}

function deepFreeze<T extends object>(obj: T): T {
  for (const value of Object.values(obj)) {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
      deepFreeze(value);
    }
  }
  return Object.freeze(obj);
}

function copyExtras(extras: AssetExtras): AssetExtras {
  const out: AssetExtras = {};
  if (extras.units && Object.keys(extras.units).length > 0) out.units = { ...extras.units };
  if (extras.uri) out.uri = extras.uri;
  if (extras.hash) out.hash = extras.hash;
  return out;
}

function parsePayload<S extends z.ZodTypeAny>(schema: S, kind: AssetKind, payload: unknown): z.infer<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new EngineError(
      validationError(`Invalid ${kind} payload`, {
        kind,
        issues: result.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      }),
    );
  }
  return result.data;
}

function buildAsset(kind: AssetKind, payload: OpenPayload, extras: AssetExtras): Asset {
  const shared = copyExtras(extras);
  switch (kind) {
    case AssetKind.System: {
      const data = parsePayload(SystemPayloadSchema, kind, payload);
      return deepFreeze({ kind, id: assetId(kind, data), payload: data, ...shared });
    }
    case AssetKind.Method: {
      const data = parsePayload(MethodPayloadSchema, kind, payload);
      return deepFreeze({ kind, id: assetId(kind, data), payload: data, ...shared });
    }
    default: {
      const data = structuredClone(payload);
      return deepFreeze({ kind, id: assetId(kind, data), payload: data, ...shared });
    }
  }
}

/**
 * Create an asset with its content-addressed id. System and Method
 * payloads are validated; an invalid payload throws VALIDATION.SCHEMA.
 */
export function createAsset(kind: AssetKind.System, payload: SystemPayload, extras?: AssetExtras): SystemAsset;
export function createAsset(kind: AssetKind.Method, payload: MethodPayload, extras?: AssetExtras): MethodAsset;
export function createAsset(kind: OpenAssetKind, payload: OpenPayload, extras?: AssetExtras): OpenAsset;
export function createAsset(kind: AssetKind, payload: OpenPayload, extras?: AssetExtras): Asset;
export function createAsset(kind: AssetKind, payload: OpenPayload, extras: AssetExtras = {}): Asset {
  return buildAsset(kind, payload, extras);
}

/** Check a payload against its kind's schema without throwing. */
export function validateAssetPayload(kind: AssetKind, payload: unknown): { valid: boolean; errors: string[] } {
  const schema =
    kind === AssetKind.System ? SystemPayloadSchema : kind === AssetKind.Method ? MethodPayloadSchema : null;
  if (!schema) return { valid: true, errors: [] };
  const result = schema.safeParse(payload);
  if (result.success) return { valid: true, errors: [] };
  return {
    valid: false,
    errors: result.error.issues.map((issue) => `${issue.path.join('.') || '(payload)'}: ${issue.message}`),
  };
}

export function assetToWire(asset: Asset): AssetWire {
  const wire: AssetWire = {
    type: asset.kind,
    id: asset.id,
    payload: structuredClone(asset.payload),
  };
  if (asset.units) wire.units = { ...asset.units };
  if (asset.uri) wire.uri = asset.uri;
  if (asset.hash) wire.hash = asset.hash;
  return wire;
}

/**
 * Decode a wire asset. The id is always recomputed from kind and payload;
 * a provided id that differs is rejected.
 */
export function assetFromWire(input: unknown): Asset {
  const parsed = AssetWireSchema.safeParse(input);
  if (!parsed.success) {
    throw new EngineError(
      validationError('Invalid asset document', {
        issues: parsed.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
      }),
    );
  }
  const { type, id, payload, units, uri, hash } = parsed.data;
  const asset = buildAsset(type, payload, { units, uri, hash });
  if (id !== undefined && id !== asset.id) {
    throw new EngineError(assetIdMismatchError(id, asset.id));
  }
  return asset;
}
