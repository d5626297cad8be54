import 'dotenv/config';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { connectToDatabase, disconnectFromDatabase } from '../config/db';
import { DOCUMENT_TYPES, type DocumentType } from '../services/knowledge/types';
import { ingestBusinessDocument } from '../services/rag/knowledgeService';
import { stripExt } from '../services/rag/textUtils';
import { readFlagValue } from './cliArgs';

function parseTypeArg(filePath: string): DocumentType {
  const raw = readFlagValue('--type');
  const match = DOCUMENT_TYPES.find((type) => type === raw);
  if (match) {
    return match;
  }
  return path.extname(filePath).toLowerCase() === '.pdf' ? 'pdf' : 'note';
}

async function main(): Promise<void> {
  const businessId = readFlagValue('--business');
  const file = readFlagValue('--file');
  if (!businessId || !file) {
    throw new Error('Usage: ingest-document --business <id> --file <path> [--title t] [--type t] [--service id]');
  }

  const absPath = path.isAbsolute(file) ? file : path.resolve(process.cwd(), file);
  const type = parseTypeArg(absPath);
  const bytes = await fs.readFile(absPath);
  console.log(`[rag:index] file: ${absPath} (${type}, ${bytes.byteLength} bytes)`);

  await connectToDatabase();
  const result = await ingestBusinessDocument({
    businessId,
    title: readFlagValue('--title') ?? stripExt(path.basename(absPath)),
    type,
    content: type === 'pdf' ? '' : bytes.toString('utf8'),
    fileBytes: type === 'pdf' ? bytes : undefined,
    filePath: absPath,
    originalFilename: path.basename(absPath),
    relatedServiceId: readFlagValue('--service'),
  });

  if (result.errors) {
    console.error('[rag:index] invalid input:', result.errors);
  }
  console.log(`[rag:index] ${result.message} (document=${result.documentId ?? '-'}, chunks=${result.indexedCount})`);
  if (!result.success) {
    process.exitCode = 1;
  }
}

main()
  .catch((error) => {
    console.error('[rag:index] failed:', error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await disconnectFromDatabase();
  });
