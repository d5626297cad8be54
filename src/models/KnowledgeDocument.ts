import { Document, Schema, Types, model } from 'mongoose';
import {
  DOCUMENT_TYPES,
  INDEXING_STATUSES,
  KNOWLEDGE_FIELDS,
  type DocumentType,
  type IndexingStatus,
  type KnowledgeField,
} from '../services/knowledge/types';

export interface KnowledgeEntryDocument {
  question: string;
  answer: string;
  metadata?: Record<string, unknown>;
}

export interface KnowledgeDocumentEntry extends Document {
  businessId: Types.ObjectId;
  title: string;
  type: DocumentType;
  originalContent: string;
  filePath?: string;
  originalFilename?: string;
  fileSize?: number;
  pageCount?: number;
  indexingStatus: IndexingStatus;
  indexingError?: string;
  indexedAt?: Date;
  relatedServiceId?: Types.ObjectId;
  previousVersionId?: Types.ObjectId;
  sourceField?: KnowledgeField;
  entries: KnowledgeEntryDocument[];
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

const knowledgeEntrySchema = new Schema<KnowledgeEntryDocument>(
  {
    question: { type: String, required: true, trim: true },
    answer: { type: String, required: true, trim: true },
    metadata: { type: Schema.Types.Mixed, default: {} },
  },
  { _id: false }
);

const knowledgeDocumentSchema = new Schema<KnowledgeDocumentEntry>(
  {
    businessId: {
      type: Schema.Types.ObjectId,
      ref: 'Business',
      required: true,
    },
    title: {
      type: String,
      required: true,
      trim: true,
      maxlength: 500,
    },
    type: {
      type: String,
      enum: DOCUMENT_TYPES,
      required: true,
    },
    originalContent: {
      type: String,
      default: '',
    },
    filePath: { type: String, trim: true },
    originalFilename: { type: String, trim: true },
    fileSize: { type: Number, min: 0 },
    pageCount: { type: Number, min: 0 },
    indexingStatus: {
      type: String,
      enum: INDEXING_STATUSES,
      default: 'pending',
      required: true,
    },
    indexingError: { type: String },
    indexedAt: { type: Date },
    relatedServiceId: {
      type: Schema.Types.ObjectId,
      ref: 'Service',
    },
    previousVersionId: {
      type: Schema.Types.ObjectId,
      ref: 'KnowledgeDocument',
    },
    sourceField: {
      type: String,
      enum: KNOWLEDGE_FIELDS,
    },
    entries: {
      type: [knowledgeEntrySchema],
      default: [],
    },
    isActive: {
      type: Boolean,
      default: true,
    },
  },
  {
    timestamps: true,
  }
);

knowledgeDocumentSchema.index({ businessId: 1, isActive: 1, indexingStatus: 1 });
knowledgeDocumentSchema.index({ businessId: 1, sourceField: 1 });
knowledgeDocumentSchema.index({ relatedServiceId: 1 });

export const KnowledgeDocument = model<KnowledgeDocumentEntry>('KnowledgeDocument', knowledgeDocumentSchema);
