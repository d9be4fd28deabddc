/**
 * Type definitions for the generation and chat API
 */

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface GenerateRequest {
  prompt: string;
  stream?: boolean;
}

export interface SimpleChatRequest {
  messages: ChatMessage[];
  stream?: boolean;
}

export interface RagChatRequest {
  message: string;
  conversationHistory?: ChatMessage[];
  topK?: number;
  stream?: boolean;
}

export interface SearchRequest {
  query: string;
  topK?: number;
}

/**
 * Source citation returned with RAG answers
 */
export interface Source {
  id: number;
  file: string;
  documentId: string;
  chunkIndex: number;
  relevance: string;
  excerpt: string;
}

export interface StreamChunk {
  type: 'start' | 'content' | 'sources' | 'done' | 'error';
  text?: string;
  sources?: Source[];
  error?: string;
}
