import { z } from 'zod';

const attributeOverridesSchema = z.object({
  userPermanentId: z.string().min(1).optional(),
  fullName: z.string().min(1).optional(),
  firstName: z.string().min(1).optional(),
  lastName: z.string().min(1).optional(),
  username: z.string().min(1).optional(),
  email: z.string().min(1).optional(),
});

export const identityProviderInputSchema = z.object({
  entityId: z.string().min(1),
  ssoUrl: z.string().url(),
  binding: z.string().min(1).optional(),
  x509Certificate: z.string().default(''),
  attributeOverrides: attributeOverridesSchema.optional(),
});

export const organizationInfoSchema = z.object({
  name: z.string().min(1),
  displayname: z.string().min(1),
  url: z.string().url(),
});

export const contactPersonSchema = z.object({
  givenName: z.string().min(1),
  emailAddress: z.string().email(),
});

export const securityConfigSchema = z.object({
  metadataValidUntil: z.string().optional(),
  metadataCacheDuration: z.string().optional(),
  authnRequestsSigned: z.boolean().optional(),
  wantAssertionsSigned: z.boolean().optional(),
  wantMessagesSigned: z.boolean().optional(),
  requestedAuthnContext: z.boolean().optional(),
  signatureAlgorithm: z.enum(['sha1', 'sha256', 'sha512']).optional(),
  acceptedClockSkewMs: z.number().int().min(-1).optional(),
});

export const serviceProviderExtraSchema = z.object({
  singleLogoutService: z
    .object({
      url: z.string().url(),
      binding: z.string().optional(),
    })
    .optional(),
  providerName: z.string().optional(),
  forceAuthn: z.boolean().optional(),
  authnContext: z.array(z.string()).optional(),
});

export const serviceProviderConfigSchema = z.object({
  entityId: z.string().min(1),
  publicCert: z.string().default(''),
  privateKey: z.string().default(''),
  organization: z.record(organizationInfoSchema).default({}),
  technicalContact: contactPersonSchema,
  supportContact: contactPersonSchema,
  enabledIdps: z.record(identityProviderInputSchema).default({}),
  securityConfig: securityConfigSchema.optional(),
  spExtra: serviceProviderExtraSchema.optional(),
  nameIdFormats: z.array(z.string()).optional(),
});
