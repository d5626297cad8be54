import { Types } from 'mongoose';
import { Business } from '../../models/Business';
import { Service } from '../../models/Service';
import type { BusinessCatalog } from './knowledgeStore';
import type {
  BusinessProfile,
  BusinessRecord,
  CatalogEntry,
  ContactInfo,
  ServiceRecord,
} from './types';

type StoredBusiness = {
  _id: Types.ObjectId;
  name: string;
  isActive?: boolean;
  businessProfile?: BusinessProfile;
  serviceCatalog?: Record<string, CatalogEntry>;
  conversationPolicies?: Record<string, string>;
  quickResponses?: Record<string, string>;
  contactInfo?: ContactInfo;
  aiInstructions?: string;
};

type StoredService = {
  _id: Types.ObjectId;
  businessId: Types.ObjectId;
  name: string;
  description?: string;
  price?: number;
  priceDisplay?: string;
  duration?: number;
  isActive?: boolean;
  displayOrder?: number;
};

function toBusinessRecord(business: StoredBusiness): BusinessRecord {
  return {
    id: business._id.toHexString(),
    name: business.name,
    isActive: business.isActive ?? true,
    businessProfile: business.businessProfile ?? {},
    serviceCatalog: business.serviceCatalog ?? {},
    conversationPolicies: business.conversationPolicies ?? {},
    quickResponses: business.quickResponses ?? {},
    contactInfo: business.contactInfo ?? {},
    aiInstructions: business.aiInstructions ?? '',
  };
}

function toServiceRecord(service: StoredService): ServiceRecord {
  return {
    id: service._id.toHexString(),
    businessId: service.businessId.toHexString(),
    name: service.name,
    description: service.description,
    price: service.price,
    priceDisplay: service.priceDisplay,
    duration: service.duration,
    isActive: service.isActive ?? true,
    displayOrder: service.displayOrder ?? 0,
  };
}

export class MongoBusinessCatalog implements BusinessCatalog {
  async getBusiness(businessId: string): Promise<BusinessRecord | null> {
    if (!Types.ObjectId.isValid(businessId)) {
      return null;
    }
    const business = await Business.findById(businessId).lean<StoredBusiness>();
    return business ? toBusinessRecord(business) : null;
  }

  async listActiveBusinesses(options: { skip: number; limit: number }): Promise<BusinessRecord[]> {
    const businesses = await Business.find({ isActive: true })
      .sort({ _id: 1 })
      .skip(options.skip)
      .limit(options.limit)
      .lean<StoredBusiness[]>();
    return businesses.map(toBusinessRecord);
  }

  async countActiveBusinesses(): Promise<number> {
    return await Business.countDocuments({ isActive: true });
  }

  async listActiveServices(businessId: string): Promise<ServiceRecord[]> {
    if (!Types.ObjectId.isValid(businessId)) {
      return [];
    }
    const services = await Service.find({ businessId: new Types.ObjectId(businessId), isActive: true })
      .sort({ displayOrder: 1, name: 1 })
      .lean<StoredService[]>();
    return services.map(toServiceRecord);
  }

  async getService(serviceId: string): Promise<ServiceRecord | null> {
    if (!Types.ObjectId.isValid(serviceId)) {
      return null;
    }
    const service = await Service.findById(serviceId).lean<StoredService>();
    return service ? toServiceRecord(service) : null;
  }
}
