import { Document, isMap, parseDocument } from 'yaml';
import { z } from 'zod';
import type { HeaderMap, TapeDocument, TapeMode } from '../types/index.js';
import { createInteraction } from '../core/interaction.js';
import { PersistenceError } from '../core/errors.js';
import { Tape, type TapeOptions } from '../core/tape.js';

export const TAPE_TAG = '!tape';

// Hand-edited tapes may carry numbers or booleans where text is expected
const TextSchema = z.union([z.string(), z.number(), z.boolean()]).transform((value) => String(value));

const HeadersSchema = z
  .record(z.string(), TextSchema)
  .nullish()
  .transform((headers) => headers ?? {});

const InteractionSchema = z.object({
  recorded: z.string().datetime({ offset: true }),
  request: z.object({
    method: z.string().min(1),
    url: z.string().min(1),
    headers: HeadersSchema,
    body: TextSchema.nullish(),
  }),
  response: z.object({
    status: z.number().int().min(200).max(599),
    headers: HeadersSchema,
    body: TextSchema.nullish(),
  }),
});

const TapeDocumentSchema = z.object({
  name: TextSchema,
  interactions: z
    .array(InteractionSchema)
    .nullish()
    .transform((interactions) => interactions ?? []),
});

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parse a `!tape` YAML document
 */
export function parseTapeDocument(text: string): TapeDocument {
  const doc = parseDocument(text);

  const [firstError] = doc.errors;
  if (firstError) {
    throw new PersistenceError(`Malformed tape document: ${firstError.message}`, undefined, undefined, firstError);
  }

  if (!isMap(doc.contents) || doc.contents.tag !== TAPE_TAG) {
    throw new PersistenceError(`Tape document must be a map tagged ${TAPE_TAG}`);
  }

  const result = TapeDocumentSchema.safeParse(doc.toJS());
  if (!result.success) {
    throw new PersistenceError(`Invalid tape document: ${formatIssues(result.error)}`, undefined, undefined, result.error);
  }

  return {
    name: result.data.name,
    interactions: result.data.interactions.map((entry) =>
      createInteraction(
        {
          method: entry.request.method,
          url: entry.request.url,
          headers: entry.request.headers,
          body: entry.request.body ?? undefined,
        },
        {
          status: entry.response.status,
          headers: entry.response.headers,
          body: entry.response.body ?? '',
        },
        new Date(entry.recorded)
      )
    ),
  };
}

/**
 * Serialize to a `!tape` YAML document. Key order and timestamp format are
 * fixed so an unmodified tape reserializes to the same bytes.
 */
export function stringifyTapeDocument(document: TapeDocument): string {
  const doc = new Document();
  // Header maps are written inline: `headers: {accept: text/plain}`
  const headers = (map: HeaderMap) => doc.createNode({ ...map }, { flow: true });

  doc.contents = doc.createNode({
    name: document.name,
    interactions: document.interactions.map((interaction) => ({
      recorded: interaction.recordedAt.toISOString(),
      request: {
        method: interaction.request.method,
        url: interaction.request.url,
        headers: headers(interaction.request.headers),
        ...(interaction.request.body ? { body: interaction.request.body } : {}),
      },
      response: {
        status: interaction.response.status,
        headers: headers(interaction.response.headers),
        body: interaction.response.body,
      },
    })),
  });

  if (isMap(doc.contents)) {
    doc.contents.tag = TAPE_TAG;
  }

  return doc.toString({ indentSeq: false, lineWidth: 0, flowCollectionPadding: false });
}

export function serializeTape(tape: Tape): string {
  return stringifyTapeDocument(tape.toDocument());
}

export function deserializeTape(text: string, mode: TapeMode, options: TapeOptions = {}): Tape {
  return Tape.fromDocument(parseTapeDocument(text), mode, options);
}
