/**
 * Manifest Packager
 *
 * The run-command API takes its working files as a base64 zip. Object i of a
 * deploy lands in the archive as manifests/<i>.json.
 */

import JSZip from 'jszip';
import { MANIFEST_DIR } from '../config/defaults';
import { describeObject, type ResourceObject } from '../domain/types';
import { SerializationError, toError } from '../errors';

export interface ManifestEntry {
  readonly path: string;
  readonly bytes: Uint8Array;
}

export interface ManifestArchive {
  readonly entries: readonly ManifestEntry[];
  /** Zip bytes of all entries, in entry order */
  readonly zip: Buffer;
}

// fixed so the same objects always produce the same bytes
const ENTRY_DATE = new Date(Date.UTC(1980, 0, 1));

export function manifestPath(index: number): string {
  return `${MANIFEST_DIR}/${index}.json`;
}

/**
 * JSON form of one object's body
 */
export function serializeObject(object: ResourceObject, index: number): Uint8Array {
  let json: string | undefined;
  try {
    json = JSON.stringify(object.body);
  } catch (error) {
    const err = toError(error);
    throw new SerializationError(
      `marshaling json for ${describeObject(object)} (object ${index}): ${err.message}`,
      index,
      err,
      { kind: object.kind, name: object.name },
    );
  }

  if (json === undefined) {
    throw new SerializationError(
      `marshaling json for ${describeObject(object)} (object ${index}): body has no JSON form`,
      index,
      undefined,
      { kind: object.kind, name: object.name },
    );
  }

  return Buffer.from(json, 'utf8');
}

/**
 * Serialize every object, then zip them. Nothing is zipped unless every
 * object serializes.
 */
export async function packageManifests(objects: readonly ResourceObject[]): Promise<ManifestArchive> {
  const entries = objects.map((object, index) =>
    Object.freeze({ path: manifestPath(index), bytes: serializeObject(object, index) }),
  );

  const zip = new JSZip();
  for (const entry of entries) {
    zip.file(entry.path, entry.bytes, { createFolders: false, date: ENTRY_DATE });
  }
  const bytes = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });

  return Object.freeze({ entries: Object.freeze(entries), zip: bytes });
}

export function encodeArchive(archive: ManifestArchive): string {
  return archive.zip.toString('base64');
}
