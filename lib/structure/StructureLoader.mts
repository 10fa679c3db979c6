/**
 * Structure Loader for the Miniserver
 *
 * Downloads the structure document and flattens it into controls:
 * room/category references are resolved to names and nested subcontrols
 * become their own entries under composite `parent/child` uuids.
 */

import { z } from 'zod';
import {
  ENDPOINTS,
  PROTOCOL_CONFIG,
  StructureError,
  parseJson,
} from '../MiniserverProtocol.mjs';
import type { Control, HttpGetFn, Logger } from '../types.mjs';

// ============================================================================
// Document Schemas
// ============================================================================

const RecordSchema = z.record(z.unknown());
const IdSchema = z.union([z.string(), z.number()]);

const StructureSchema = z
  .object({
    controls: RecordSchema,
    rooms: RecordSchema.nullish(),
    cats: RecordSchema.nullish(),
  })
  .passthrough();

const RawControlSchema = z
  .object({
    name: z.string().nullish(),
    type: z.string().nullish(),
    room: IdSchema.nullish(),
    cat: IdSchema.nullish(),
    states: RecordSchema.nullish(),
    details: RecordSchema.nullish(),
    subControls: z.union([RecordSchema, z.array(z.unknown())]).nullish(),
  })
  .passthrough();

type RawControl = z.infer<typeof RawControlSchema>;

const NamedSchema = z.object({ name: z.string() }).passthrough();

/** Keys a subcontrol in list form may carry its id under, in priority order */
const SubControlIdSchema = z
  .object({
    id: IdSchema.optional(),
    uuid: IdSchema.optional(),
    uuidAction: IdSchema.optional(),
  })
  .passthrough();

// ============================================================================
// Parsing
// ============================================================================

function buildLookup(table: Record<string, unknown> | null | undefined): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const [id, entry] of Object.entries(table ?? {})) {
    const named = NamedSchema.safeParse(entry);
    if (named.success) {
      lookup.set(id, named.data.name);
    }
  }
  return lookup;
}

function resolveName(
  lookup: Map<string, string>,
  ref: string | number | null | undefined
): string | null {
  if (ref === null || ref === undefined) return null;
  return lookup.get(String(ref)) ?? null;
}

function subControlId(item: unknown): string | undefined {
  const parsed = SubControlIdSchema.safeParse(item);
  if (!parsed.success) return undefined;
  const id = parsed.data.id ?? parsed.data.uuid ?? parsed.data.uuidAction;
  return id === undefined ? undefined : String(id);
}

function stripParentPrefix(parentUuid: string, id: string): string {
  const prefix = `${parentUuid}${PROTOCOL_CONFIG.COMPOSITE_SEPARATOR}`;
  return id.startsWith(prefix) ? id.slice(prefix.length) : id;
}

function subControlEntries(
  parent: Control,
  raw: RawControl['subControls'],
  logger?: Logger
): Array<[string, unknown]> {
  if (!raw) return [];
  if (!Array.isArray(raw)) return Object.entries(raw);

  const entries: Array<[string, unknown]> = [];
  raw.forEach((item, index) => {
    const id = subControlId(item);
    if (id === undefined) {
      logger?.debug(`Skipping subcontrol #${index} of ${parent.uuid}: no id`);
      return;
    }
    entries.push([id, item]);
  });
  return entries;
}

function flattenSubControls(
  parent: Control,
  raw: RawControl['subControls'],
  out: Control[],
  logger?: Logger
): void {
  for (const [rawId, value] of subControlEntries(parent, raw, logger)) {
    const parsed = RawControlSchema.safeParse(value);
    if (!parsed.success) {
      logger?.debug(`Skipping malformed subcontrol ${rawId} of ${parent.uuid}`);
      continue;
    }

    const childId = stripParentPrefix(parent.uuid, rawId);
    const child: Control = {
      uuid: `${parent.uuid}${PROTOCOL_CONFIG.COMPOSITE_SEPARATOR}${childId}`,
      name: `${parent.name} ${parsed.data.name || childId}`,
      type: parsed.data.type ?? '',
      room: parent.room,
      category: parent.category,
      states: parsed.data.states ?? {},
      details: {
        ...(parsed.data.details ?? {}),
        parent_uuid: parent.uuid,
        subcontrol_id: childId,
      },
    };

    out.push(child);
    flattenSubControls(child, parsed.data.subControls, out, logger);
  }
}

/**
 * Flatten a structure document into controls, parents before their subcontrols
 *
 * @throws StructureError if the document has no `controls` map
 */
export function parseStructure(document: unknown, logger?: Logger): Control[] {
  const structure = StructureSchema.safeParse(document);
  if (!structure.success) {
    throw new StructureError('Structure document has an unexpected shape', structure.error.issues);
  }

  const rooms = buildLookup(structure.data.rooms);
  const categories = buildLookup(structure.data.cats);
  const controls: Control[] = [];

  for (const [uuid, value] of Object.entries(structure.data.controls)) {
    const parsed = RawControlSchema.safeParse(value);
    if (!parsed.success) {
      logger?.debug(`Skipping malformed control ${uuid}`);
      continue;
    }

    const control: Control = {
      uuid,
      name: parsed.data.name || uuid,
      type: parsed.data.type ?? '',
      room: resolveName(rooms, parsed.data.room),
      category: resolveName(categories, parsed.data.cat),
      states: parsed.data.states ?? {},
      details: parsed.data.details ?? {},
    };

    controls.push(control);
    flattenSubControls(control, parsed.data.subControls, controls, logger);
  }

  return controls;
}

// ============================================================================
// StructureLoader Class
// ============================================================================

export class StructureLoader {
  private httpGet: HttpGetFn;
  private logger: Logger;

  constructor(httpGet: HttpGetFn, logger: Logger) {
    this.httpGet = httpGet;
    this.logger = logger;
  }

  /**
   * Fetch and parse the structure document. Every failure is logged and
   * yields an empty list.
   */
  async load(headers: Record<string, string> = {}): Promise<Control[]> {
    try {
      const response = await this.httpGet(ENDPOINTS.STRUCTURE, headers);
      if (response.status !== 200) {
        throw new StructureError(`Failed to download structure file: ${response.status}`, {
          status: response.status,
        });
      }

      const controls = parseStructure(parseJson(response.body), this.logger);
      this.logger.debug(`Loaded ${controls.length} controls from structure`);
      return controls;
    } catch (error) {
      this.logger.error(
        `Unable to load structure: ${error instanceof Error ? error.message : String(error)}`
      );
      return [];
    }
  }
}
