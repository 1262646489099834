import type { Profile } from '@profile-chat/chat-contract';

export const CONTACT_PLATFORM_VALUES = ['email', 'linkedin', 'github', 'website'] as const;

export type ContactPlatform = (typeof CONTACT_PLATFORM_VALUES)[number];

export type ContactLink = {
  platform: ContactPlatform;
  label: string;
  url: string;
  display: string;
};

const LABELS: Record<ContactPlatform, string> = {
  email: 'Email',
  linkedin: 'LinkedIn',
  github: 'GitHub',
  website: 'Portfolio Website',
};

function toHref(platform: ContactPlatform, value: string): string {
  if (platform === 'email') {
    return value.startsWith('mailto:') ? value : `mailto:${value}`;
  }
  return /^https?:\/\//i.test(value) ? value : `https://${value}`;
}

/** Contact entries in display order; empty profile fields are skipped. */
export function getProfileContactLinks(
  profile: Pick<Profile, 'contact_email' | 'linkedin_profile' | 'github_profile' | 'portfolio_website'>
): ContactLink[] {
  const values: Record<ContactPlatform, string> = {
    email: profile.contact_email,
    linkedin: profile.linkedin_profile,
    github: profile.github_profile,
    website: profile.portfolio_website,
  };
  const links: ContactLink[] = [];
  for (const platform of CONTACT_PLATFORM_VALUES) {
    const value = values[platform].trim();
    if (!value) {
      continue;
    }
    links.push({ platform, label: LABELS[platform], url: toHref(platform, value), display: value });
  }
  return links;
}
