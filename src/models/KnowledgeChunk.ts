import { Document, Schema, Types, model } from 'mongoose';
import type { ChunkMetadata } from '../services/knowledge/types';

export interface KnowledgeChunkDocument extends Document {
  documentId: Types.ObjectId;
  businessId: Types.ObjectId;
  content: string;
  embedding: number[];
  chunkIndex: number;
  metadata: ChunkMetadata;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const knowledgeChunkSchema = new Schema<KnowledgeChunkDocument>(
  {
    documentId: {
      type: Schema.Types.ObjectId,
      ref: 'KnowledgeDocument',
      required: true,
    },
    businessId: {
      type: Schema.Types.ObjectId,
      ref: 'Business',
      required: true,
    },
    content: {
      type: String,
      required: true,
      trim: true,
    },
    embedding: {
      type: [Number],
      required: true,
    },
    chunkIndex: {
      type: Number,
      required: true,
      min: 0,
    },
    metadata: {
      type: Schema.Types.Mixed,
      default: {},
    },
    isActive: {
      type: Boolean,
      default: true,
    },
  },
  {
    timestamps: true,
    minimize: false,
  }
);

knowledgeChunkSchema.index({ businessId: 1, isActive: 1 });
knowledgeChunkSchema.index({ documentId: 1, chunkIndex: 1 });

export const KnowledgeChunk = model<KnowledgeChunkDocument>('KnowledgeChunk', knowledgeChunkSchema);
