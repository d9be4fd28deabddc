/**
 * Prompts for the RAG chat assistant
 */

import { ChatMessage, Source } from '../../types/chat';
import { SearchResult } from '../../types/vector';
import { getContentPreview } from '../chunking/preprocessor';

export const CONTEXT_SEPARATOR = '\n---\n';
const DEFAULT_MAX_CONTEXT_LENGTH = 2000;

/**
 * Formats retrieved chunks into a context block
 *
 * Chunks are taken in rank order; the first chunk that would push the
 * context past maxContextLength ends the block.
 *
 * @returns The context string and the chunks it contains
 */
export function formatContextFromChunks(
  chunks: SearchResult[],
  maxContextLength = DEFAULT_MAX_CONTEXT_LENGTH
): { context: string; used: SearchResult[] } {
  const parts: string[] = [];
  const used: SearchResult[] = [];
  let currentLength = 0;

  for (const chunk of chunks) {
    const part = `From ${chunk.file}:\n${chunk.content}\n`;

    if (currentLength + part.length > maxContextLength) {
      break;
    }

    parts.push(part);
    used.push(chunk);
    currentLength += part.length;
  }

  return { context: parts.join(CONTEXT_SEPARATOR), used };
}

/**
 * Generates the system prompt, with or without retrieved context
 */
export function getSystemPrompt(context: string): string {
  if (!context) {
    return `You are a helpful personal assistant.
No documents from the knowledge base matched this question. Answer from general knowledge and say so when you are unsure.`;
  }

  return `You are a helpful personal assistant answering questions from the user's own documents.

RULES:
1. Base your answer on the documents below whenever they are relevant.
2. Mention the file a statement comes from when you rely on it.
3. If the documents do not contain the answer, say so honestly before answering from general knowledge.
4. Keep answers concise and accurate.

DOCUMENTS:
${context}`;
}

/**
 * Builds the message list for a RAG-augmented chat turn
 */
export function buildRagMessages(
  context: string,
  message: string,
  conversationHistory: ChatMessage[] = []
): ChatMessage[] {
  return [
    { role: 'system', content: getSystemPrompt(context) },
    ...conversationHistory.filter((msg) => msg.role !== 'system'),
    { role: 'user', content: message },
  ];
}

/**
 * Formats sources for display next to an answer
 *
 * @param maxSources - Maximum number of sources to return (default: 5)
 */
export function formatSourcesForDisplay(chunks: SearchResult[], maxSources = 5): Source[] {
  return chunks.slice(0, maxSources).map((chunk, index) => ({
    id: index + 1,
    file: chunk.file,
    documentId: chunk.documentId,
    chunkIndex: chunk.chunkIndex,
    relevance: (chunk.score * 100).toFixed(1),
    excerpt: getContentPreview(chunk.content, 200),
  }));
}
