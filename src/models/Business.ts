import { Document, Schema, model } from 'mongoose';
import type { BusinessProfile, CatalogEntry, ContactInfo } from '../services/knowledge/types';

export interface BusinessDocument extends Document {
  name: string;
  isActive: boolean;
  businessProfile: BusinessProfile;
  serviceCatalog: Record<string, CatalogEntry>;
  conversationPolicies: Record<string, string>;
  quickResponses: Record<string, string>;
  contactInfo: ContactInfo;
  aiInstructions: string;
  createdAt: Date;
  updatedAt: Date;
}

const businessSchema = new Schema<BusinessDocument>(
  {
    name: {
      type: String,
      required: true,
      trim: true,
      maxlength: 200,
    },
    isActive: {
      type: Boolean,
      default: true,
    },
    businessProfile: {
      description: { type: String, trim: true },
      specialties: { type: [String], default: undefined },
      areasServed: { type: [String], default: undefined },
    },
    serviceCatalog: {
      type: Schema.Types.Mixed,
      default: {},
    },
    conversationPolicies: {
      type: Schema.Types.Mixed,
      default: {},
    },
    quickResponses: {
      type: Schema.Types.Mixed,
      default: {},
    },
    contactInfo: {
      address: { type: String, trim: true },
      email: { type: String, trim: true, lowercase: true },
      website: { type: String, trim: true },
      officePhone: { type: String, trim: true },
      emergencyLine: { type: String, trim: true },
    },
    aiInstructions: {
      type: String,
      default: '',
    },
  },
  {
    timestamps: true,
    minimize: false,
  }
);

businessSchema.index({ isActive: 1 });

export const Business = model<BusinessDocument>('Business', businessSchema);
