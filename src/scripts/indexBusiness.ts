import 'dotenv/config';
import { connectToDatabase, disconnectFromDatabase } from '../config/db';
import {
  deleteBusinessKnowledge,
  getKnowledgeIndexingStatus,
  indexAllBusinessKnowledge,
  indexBusinessKnowledge,
} from '../services/rag/knowledgeService';
import { hasFlag, readFlagValue, readListFlag, readPositiveInt } from './cliArgs';

const USAGE =
  'Usage: index-business --business <id> [--fields a,b] [--delete] | --all [--batch-size n] | --status';

async function main(): Promise<void> {
  const businessId = readFlagValue('--business');
  const indexAll = hasFlag('--all');
  const showStatus = hasFlag('--status');
  if (!businessId && !indexAll && !showStatus) {
    throw new Error(USAGE);
  }

  await connectToDatabase();

  if (showStatus) {
    const status = await getKnowledgeIndexingStatus();
    if (!status.success) {
      console.error(`[rag:index] status failed: ${status.message}`);
      process.exitCode = 1;
      return;
    }
    console.log(
      `[rag:index] businesses=${status.totalActiveBusinesses}, indexed=${status.indexedBusinesses}, ` +
        `not indexed=${status.notIndexed}, chunks=${status.totalKnowledgeChunks}, ` +
        `avg chunks=${status.averageChunksPerBusiness}`
    );
    return;
  }

  if (indexAll) {
    const summary = await indexAllBusinessKnowledge(readPositiveInt('--batch-size'));
    for (const detail of summary.details) {
      console.log(
        `[rag:index] ${detail.businessName} (${detail.businessId}): ${detail.success ? 'ok' : 'failed'} - ${detail.message}`
      );
    }
    console.log(
      `[rag:index] completed: businesses=${summary.totalBusinesses}, successful=${summary.successful}, failed=${summary.failed}`
    );
    if (!summary.success || summary.failed > 0) {
      process.exitCode = 1;
    }
    return;
  }

  if (!businessId) {
    throw new Error(USAGE);
  }

  if (hasFlag('--delete')) {
    const deleted = await deleteBusinessKnowledge(businessId);
    console.log(`[rag:index] ${deleted.message}: documents=${deleted.deletedDocuments}`);
    if (!deleted.success) {
      process.exitCode = 1;
    }
    return;
  }

  const result = await indexBusinessKnowledge(businessId, readListFlag('--fields'));
  console.log(
    `[rag:index] ${result.message}: deleted=${result.deletedCount}, indexed=${result.indexedCount}, documents=${result.documentIds.length}`
  );
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
