import { Document, Schema, Types, model } from 'mongoose';

export interface ServiceDocument extends Document {
  businessId: Types.ObjectId;
  name: string;
  description?: string;
  price?: number;
  priceDisplay?: string;
  duration?: number;
  isActive: boolean;
  displayOrder: number;
  createdAt: Date;
  updatedAt: Date;
}

const serviceSchema = new Schema<ServiceDocument>(
  {
    businessId: {
      type: Schema.Types.ObjectId,
      ref: 'Business',
      required: true,
    },
    name: {
      type: String,
      required: true,
      trim: true,
      maxlength: 200,
    },
    description: {
      type: String,
      trim: true,
    },
    price: {
      type: Number,
      min: 0,
    },
    // e.g. "Free", "Starting at $50"
    priceDisplay: {
      type: String,
      trim: true,
      maxlength: 50,
    },
    duration: {
      type: Number,
      min: 0,
    },
    isActive: {
      type: Boolean,
      default: true,
    },
    displayOrder: {
      type: Number,
      default: 0,
    },
  },
  {
    timestamps: true,
  }
);

serviceSchema.index({ businessId: 1, isActive: 1, displayOrder: 1 });

export const Service = model<ServiceDocument>('Service', serviceSchema);
