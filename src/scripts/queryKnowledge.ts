import 'dotenv/config';
import { connectToDatabase, disconnectFromDatabase } from '../config/db';
import { DOCUMENT_TYPES } from '../services/knowledge/types';
import { retrieveBusinessContext } from '../services/rag/knowledgeService';
import { hasFlag, readFlagValue, readPositiveInt } from './cliArgs';

async function main(): Promise<void> {
  const businessId = readFlagValue('--business');
  const query = readFlagValue('--query');
  if (!businessId || !query) {
    throw new Error('Usage: query-knowledge --business <id> --query <text> [--service name] [--type t] [--limit n] [--debug]');
  }

  const rawType = readFlagValue('--type');
  const documentTypeFilter = DOCUMENT_TYPES.find((type) => type === rawType);

  await connectToDatabase();
  const { context, debug } = await retrieveBusinessContext(query, businessId, {
    serviceFilter: readFlagValue('--service'),
    documentTypeFilter,
    limit: readPositiveInt('--limit'),
  });

  if (hasFlag('--debug')) {
    console.log(JSON.stringify(debug, null, 2));
  }
  console.log(context || '[rag:retrieve] no context found');
  if (debug.error) {
    process.exitCode = 1;
  }
}

main()
  .catch((error) => {
    console.error('[rag:retrieve] failed:', error);
    process.exitCode = 1;
  })
  .finally(async () => {
    await disconnectFromDatabase();
  });
