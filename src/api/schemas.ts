import { z } from 'zod';

// The registry omits absent fields but occasionally sends null.
const optionalString = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

const requiredString = z
  .string()
  .nullish()
  .transform((value) => value ?? '');

const addressSchema = z.record(z.unknown()).transform((raw) => {
  const address: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value === 'string') {
      address[key] = value;
    }
  }
  return address;
});

export const searchItemSchema = z
  .object({
    title: requiredString,
    company_number: requiredString,
    company_status: optionalString,
    company_type: optionalString,
    date_of_creation: optionalString,
    address: addressSchema.optional(),
    address_snippet: optionalString,
    description: optionalString,
  })
  .passthrough();

export const searchResponseSchema = z.object({
  items: z.array(searchItemSchema).optional(),
  total_results: z.number().optional(),
});

export const profileResponseSchema = z.object({
  company_number: requiredString,
  company_name: requiredString,
  company_status: requiredString,
  date_of_creation: optionalString,
  type: requiredString,
  sic_codes: z.array(z.string()).optional(),
  registered_office_address: addressSchema.optional(),
  business_activity: optionalString,
});

export const officerItemSchema = z.object({
  name: requiredString,
  officer_role: requiredString,
  appointed_on: optionalString,
  resigned_on: optionalString,
  nationality: optionalString,
  occupation: optionalString,
  country_of_residence: optionalString,
  links: z
    .object({
      officer: z.object({ appointments: optionalString }).optional(),
    })
    .optional(),
});

export const officersResponseSchema = z.object({
  items: z.array(officerItemSchema).optional(),
});

export const pscItemSchema = z.object({
  name: requiredString,
  kind: optionalString,
  natures_of_control: z
    .array(z.string())
    .nullish()
    .transform((value) => value ?? []),
  notified_on: optionalString,
  country_of_residence: optionalString,
  nationality: optionalString,
  links: z.object({ self: optionalString }).optional(),
});

export const pscsResponseSchema = z.object({
  items: z.array(pscItemSchema).optional(),
});

export type RawProfile = z.infer<typeof profileResponseSchema>;
export type RawOfficer = z.infer<typeof officerItemSchema>;
export type RawPsc = z.infer<typeof pscItemSchema>;
