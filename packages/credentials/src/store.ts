import {randomUUID} from 'node:crypto';
import {mkdir, readFile, rename, writeFile} from 'node:fs/promises';
import path from 'node:path';

import {z} from 'zod';

import {CredentialRecordSchema, type CredentialRecord} from './contracts';

/**
 * Persistence for cached tokens, keyed by upstream identity. Implementations
 * may throw; the credential manager logs store failures and keeps working
 * from memory.
 */
export type CredentialStore = {
  load: (identity: string) => Promise<CredentialRecord | null>;
  save: (record: CredentialRecord) => Promise<void>;
  remove: (identity: string) => Promise<void>;
};

export const createInMemoryCredentialStore = (initial: readonly CredentialRecord[] = []): CredentialStore => {
  const records = new Map(initial.map(record => [record.identity, record] as const));

  return {
    load: identity => Promise.resolve(records.get(identity) ?? null),
    save: record => {
      records.set(record.identity, record);
      return Promise.resolve();
    },
    remove: identity => {
      records.delete(identity);
      return Promise.resolve();
    }
  };
};

const CredentialFileSchema = z
  .object({
    version: z.literal(1),
    records: z.record(z.string(), CredentialRecordSchema)
  })
  .strict();

type CredentialFile = z.infer<typeof CredentialFileSchema>;

const isMissingFileError = (error: unknown) =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT';

/**
 * JSON file holding one record per identity. Writes go to a temp file that is
 * renamed over the target, and are serialized within the process.
 */
export const createFileCredentialStore = ({filePath}: {filePath: string}): CredentialStore => {
  const absolutePath = path.resolve(filePath);
  let queue: Promise<void> = Promise.resolve();

  const readFileState = async (): Promise<CredentialFile> => {
    let raw: string;
    try {
      // eslint-disable-next-line security/detect-non-literal-fs-filename
      raw = await readFile(absolutePath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return {version: 1, records: {}};
      }
      throw error;
    }

    const parsed = CredentialFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Credential store ${absolutePath} is malformed`);
    }

    return parsed.data;
  };

  const writeFileState = async (state: CredentialFile) => {
    // eslint-disable-next-line security/detect-non-literal-fs-filename
    await mkdir(path.dirname(absolutePath), {recursive: true});
    const tempPath = `${absolutePath}.${randomUUID()}.tmp`;
    // eslint-disable-next-line security/detect-non-literal-fs-filename
    await writeFile(tempPath, `${JSON.stringify(state, null, 2)}\n`, {encoding: 'utf8', mode: 0o600});
    await rename(tempPath, absolutePath);
  };

  const enqueue = <T>(task: () => Promise<T>): Promise<T> => {
    const run = queue.then(task);
    // the caller observes failures through `run`; the chain only orders tasks
    queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  };

  return {
    load: identity => enqueue(async () => (await readFileState()).records[identity] ?? null),
    save: record =>
      enqueue(async () => {
        const state = await readFileState();
        await writeFileState({...state, records: {...state.records, [record.identity]: record}});
      }),
    remove: identity =>
      enqueue(async () => {
        const state = await readFileState();
        if (!(identity in state.records)) {
          return;
        }

        const records = Object.fromEntries(Object.entries(state.records).filter(([key]) => key !== identity));
        await writeFileState({...state, records});
      })
  };
};
