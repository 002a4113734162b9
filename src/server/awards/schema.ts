import { z } from "zod";

export const AWARD_STATUSES = [
  "pending",
  "active",
  "unsuccessful",
  "cancelled",
] as const;

export const AWARD_STATUS_DETAILS = [
  "empty",
  "active",
  "unsuccessful",
  "consideration",
  "awaiting",
  "noOffersReceived",
  "lotCancelled",
] as const;

const optionalText = () => z.string().nullable().default(null);

export const identifierSchema = z.object({
  scheme: z.string().trim().min(1, "identifier.scheme is required"),
  id: z.string().trim().min(1, "identifier.id is required"),
  legalName: z.string(),
  uri: optionalText(),
});

const locationSchema = z.object({
  scheme: z.string(),
  id: z.string(),
  description: z.string(),
  uri: optionalText(),
});

export const addressSchema = z.object({
  streetAddress: z.string(),
  postalCode: optionalText(),
  addressDetails: z.object({
    country: locationSchema,
    region: locationSchema,
    locality: locationSchema,
  }),
});

export const contactPointSchema = z.object({
  name: z.string(),
  email: z.string(),
  telephone: z.string(),
  faxNumber: optionalText(),
  url: optionalText(),
});

export const supplierInputSchema = z.object({
  name: z.string(),
  identifier: identifierSchema,
  additionalIdentifiers: z.array(identifierSchema).default([]),
  address: addressSchema,
  contactPoint: contactPointSchema,
  details: z.object({ scale: z.string() }),
});

export const supplierSchema = supplierInputSchema.extend({
  id: z.string(),
});

export const valueSchema = z.object({
  amount: z.number().nonnegative("value.amount must not be negative"),
  currency: z.string().trim().min(1, "value.currency is required"),
});

export const documentSchema = z.object({
  id: z.string().min(1),
  documentType: z.string(),
  title: optionalText(),
  description: optionalText(),
  relatedLots: z.array(z.string()).default([]),
});

export const requirementResponseSchema = z.object({
  id: z.string().min(1),
  value: z.union([z.string(), z.number(), z.boolean()]),
  relatedTenderer: z.object({ id: z.string().min(1) }),
  requirement: z.object({ id: z.string().min(1) }),
  responder: z.object({ id: z.string().min(1), name: z.string() }),
});

/** Body stored in the `json_data` column of the awards table. */
export const awardSchema = z.object({
  id: z.string().min(1),
  token: z.string().min(1),
  title: optionalText(),
  description: optionalText(),
  date: z.string(),
  status: z.enum(AWARD_STATUSES),
  statusDetails: z.enum(AWARD_STATUS_DETAILS),
  relatedLots: z.array(z.string()).min(1),
  value: valueSchema.nullable().default(null),
  suppliers: z.array(supplierSchema).default([]),
  documents: z.array(documentSchema).default([]),
  requirementResponses: z.array(requirementResponseSchema).default([]),
});

const requestDocumentSchema = z.object({
  id: z.string().min(1),
  documentType: z.string(),
  title: optionalText(),
  description: optionalText(),
  relatedLots: z
    .array(z.string())
    .min(1, "document relatedLots must not be empty")
    .optional(),
});

export const createAwardRequestSchema = z.object({
  award: z.object({
    description: optionalText(),
    value: valueSchema,
    suppliers: z.array(supplierInputSchema).min(1, "award.suppliers must not be empty"),
  }),
  referenceVocabulary: z.object({
    validSchemes: z.array(z.string()),
    validScales: z.array(z.string()),
  }),
});

export const evaluateAwardRequestSchema = z.object({
  award: z.object({
    statusDetails: z.enum(AWARD_STATUS_DETAILS),
    description: optionalText(),
    documents: z
      .array(requestDocumentSchema)
      .min(1, "award.documents must not be empty")
      .optional(),
  }),
});

const CPID_PATTERN = /^ocds-[a-z0-9]{6}-[A-Z]{2}-\d{13}$/;

const cpidSchema = z
  .string()
  .regex(CPID_PATTERN, "cpid must look like ocds-xxxxxx-XX-0000000000000");

export const addRequirementResponseRequestSchema = z.object({
  cpid: cpidSchema,
  ocid: z.string(),
  award: z.object({
    id: z.string().min(1),
    requirementResponse: requirementResponseSchema,
  }),
});

export const UNSUCCESSFUL_OPERATION_TYPES = [
  "tenderOrLotAmendmentConfirmation",
  "submissionPeriodEnd",
] as const;

export const createUnsuccessfulAwardsRequestSchema = z.object({
  cpid: cpidSchema,
  ocid: z.string(),
  lotIds: z
    .array(z.string().uuid("lotIds must contain uuids"))
    .min(1, "lotIds must not be empty")
    .refine((ids) => new Set(ids).size === ids.length, {
      message: "lotIds must be unique",
    }),
  date: z.string().datetime({ message: "date must be an ISO timestamp" }),
  operationType: z.enum(UNSUCCESSFUL_OPERATION_TYPES),
});
