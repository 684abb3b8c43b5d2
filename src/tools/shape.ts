import type { MetaResponse, SpotMetaResponse } from "../client/types.js";

// ============================================================================
// RESPONSE SHAPING
//
// Pure transformations applied after the upstream call. Nothing here touches
// the network or keeps state.
// ============================================================================

export type Metadata = MetaResponse | SpotMetaResponse;

/**
 * Shape a perp or spot metadata response.
 *
 * The exchange answers `metaAndAssetCtxs` and `spotMetaAndAssetCtxs` with a
 * `[meta, assetCtxs]` tuple and `meta` / `spotMeta` with the bare object.
 * Without `includeAssetCtxs` the result never carries asset contexts; with it
 * the contexts are kept under `assetCtxs`.
 *
 * @example
 * ```typescript
 * shapeMetadata([{ universe }, ctxs], false); // { universe }
 * shapeMetadata([{ universe }, ctxs], true);  // { universe, assetCtxs: ctxs }
 * ```
 */
export function shapeMetadata(
  payload: Metadata | [Metadata, unknown[]],
  includeAssetCtxs: boolean
): Record<string, unknown> {
  if (isMetaTuple(payload)) {
    const [meta, assetCtxs] = payload;
    return includeAssetCtxs ? { ...meta, assetCtxs } : stripAssetCtxs(meta);
  }
  return stripAssetCtxs(payload);
}

function isMetaTuple(payload: Metadata | [Metadata, unknown[]]): payload is [Metadata, unknown[]] {
  return Array.isArray(payload);
}

function stripAssetCtxs(meta: Record<string, unknown>): Record<string, unknown> {
  const { assetCtxs: _omitted, ...rest } = meta;
  return rest;
}

/**
 * Build the `structuredContent` of a tool result. MCP requires an object, so
 * arrays and scalars are wrapped as `{ result }`.
 */
export function toStructuredContent(payload: unknown): Record<string, unknown> {
  if (isRecord(payload)) return payload;
  return { result: payload ?? null };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
