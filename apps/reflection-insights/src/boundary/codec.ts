/**
 * Reflection Codec
 *
 * zod schemas turning encoded JSON text into typed reflections or numbers.
 * Decoding never throws: failures come back as a fallback result.
 */

import { z } from 'zod';
import { Location, Person, Reflection } from '../types';
import { DecodeError } from '../utils/errors';

/**
 * Outcome of decoding one encoded payload
 */
export type DecodeResult<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'fallback'; error: DecodeError };

export const ok = <T>(value: T): DecodeResult<T> => ({ kind: 'ok', value });

export const fallback = <T>(error: DecodeError): DecodeResult<T> => ({ kind: 'fallback', error });

// JSON.parse turns overflowing literals such as 1e999 into Infinity
const finiteNumber = z.number().finite();

const optionalString = z.string().nullish();
const optionalNumber = finiteNumber.nullish();
const optionalStrings = z.array(z.string()).nullish();

const locationSchema = z.object({
  placeName: optionalString,
  city: optionalString,
  country: optionalString,
});

const personSchema = z.object({
  id: optionalString,
  name: optionalString,
});

export const reflectionSchema = z.object({
  timestamp: z.string(),
  emotionId: optionalString,
  emotionName: optionalString,
  intensity: optionalNumber,
  relatedEmotions: optionalStrings,
  location: locationSchema.nullish(),
  people: z.array(personSchema).nullish(),
  copingStrategies: optionalStrings,
  moodBefore: optionalNumber,
  moodAfter: optionalNumber,
});

export const reflectionsSchema = z.array(reflectionSchema);

export const valuesSchema = z.array(finiteNumber);

type EncodedReflection = z.infer<typeof reflectionSchema>;
type EncodedLocation = z.infer<typeof locationSchema>;
type EncodedPerson = z.infer<typeof personSchema>;

/**
 * null and absent both become undefined
 */
function present<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

function toLocation(location: EncodedLocation): Location {
  return {
    placeName: present(location.placeName),
    city: present(location.city),
    country: present(location.country),
  };
}

function toPerson(person: EncodedPerson): Person {
  return {
    id: present(person.id),
    name: present(person.name),
  };
}

export function toReflection(encoded: EncodedReflection): Reflection {
  return {
    timestamp: encoded.timestamp,
    emotionId: present(encoded.emotionId),
    emotionName: present(encoded.emotionName),
    intensity: present(encoded.intensity),
    relatedEmotions: present(encoded.relatedEmotions),
    location: encoded.location ? toLocation(encoded.location) : undefined,
    people: encoded.people ? encoded.people.map(toPerson) : undefined,
    copingStrategies: present(encoded.copingStrategies),
    moodBefore: present(encoded.moodBefore),
    moodAfter: present(encoded.moodAfter),
  };
}

function parseJson(text: string): DecodeResult<unknown> {
  try {
    return ok(JSON.parse(text));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return fallback(new DecodeError('Input is not valid JSON', { reason: message }));
  }
}

function decodeWith<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): DecodeResult<T> {
  const json = parseJson(text);
  if (json.kind === 'fallback') {
    return json;
  }

  const parsed = schema.safeParse(json.value);
  if (!parsed.success) {
    return fallback(
      new DecodeError('Input does not match the expected shape', {
        issues: parsed.error.issues.map(issue => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      })
    );
  }

  return ok(parsed.data);
}

/**
 * Decode a JSON array of reflections
 */
export function decodeReflections(text: string): DecodeResult<Reflection[]> {
  const decoded = decodeWith(text, reflectionsSchema);
  return decoded.kind === 'ok' ? ok(decoded.value.map(toReflection)) : decoded;
}

/**
 * Decode a JSON array of numbers
 */
export function decodeValues(text: string): DecodeResult<number[]> {
  return decodeWith(text, valuesSchema);
}
