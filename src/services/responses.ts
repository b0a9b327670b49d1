import { z } from 'zod';

// Every field is optional: a missing field is a validation failure reported
// by the calling service, while a field of the wrong type is a parse error.

export const ProfileSchema = z.object({
  id: z.string(),
  name: z.string().optional(),
  isActive: z.boolean().optional(),
  sessionWalletAddress: z.string().nullable().optional(),
});

export const TokensSchema = z.object({
  accessToken: z.string().optional(),
  refreshToken: z.string().optional(),
});

export const AccountSchema = z.object({
  id: z.string().optional(),
  type: z.string().optional(),
});

export const AuthResponseSchema = z.object({
  success: z.boolean().optional(),
  isNewUser: z.boolean().optional(),
  account: AccountSchema.optional(),
  profiles: z.array(ProfileSchema).optional(),
  activeProfile: ProfileSchema.optional(),
  tokens: TokensSchema.optional(),
  sessionId: z.string().optional(),
});

export const SuccessResponseSchema = z.object({
  success: z.boolean().optional(),
});

export const RefreshResponseSchema = z.object({
  success: z.boolean().optional(),
  tokens: TokensSchema.optional(),
});

export const ProfileListResponseSchema = z.object({
  data: z.array(ProfileSchema).optional(),
  profiles: z.array(ProfileSchema).optional(),
});

export const ProfileResponseSchema = z.object({
  success: z.boolean().optional(),
  data: ProfileSchema.optional(),
  profile: ProfileSchema.optional(),
});

export const SwitchProfileResponseSchema = z.object({
  success: z.boolean().optional(),
  activeProfile: ProfileSchema.optional(),
});

export const LinkSchema = z.object({
  id: z.string().optional(),
  accountAId: z.string().optional(),
  accountBId: z.string().optional(),
  privacyMode: z.string().optional(),
});

export const LinkAccountResponseSchema = z.object({
  success: z.boolean().optional(),
  linkedAccount: AccountSchema.optional(),
  link: LinkSchema.optional(),
});

export const IdentityGraphResponseSchema = z.object({
  currentAccountId: z.string().optional(),
  accounts: z.array(AccountSchema).optional(),
  links: z.array(LinkSchema).optional(),
});

export const PrivacyModeResponseSchema = z.object({
  success: z.boolean().optional(),
  link: LinkSchema.optional(),
});

export type ProfilePayload = z.infer<typeof ProfileSchema>;
export type AuthResponse = z.infer<typeof AuthResponseSchema>;

/** Profiles come back under `data` or `profiles` depending on the endpoint. */
export function profileList(
  response: z.infer<typeof ProfileListResponseSchema>,
): ProfilePayload[] | undefined {
  return response.data ?? response.profiles;
}

export function singleProfile(
  response: z.infer<typeof ProfileResponseSchema>,
): ProfilePayload | undefined {
  return response.data ?? response.profile;
}
