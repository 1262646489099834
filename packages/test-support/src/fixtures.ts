import type { Profile } from '@profile-chat/chat-contract';

export const TEST_PROFILE: Profile = {
  name: 'Avery Quinn',
  occupation: 'Full Stack Developer',
  about_me: 'I build small, fast web apps and enjoy teaching.',
  skills: ['TypeScript', 'React', 'Node.js', 'PostgreSQL'],
  education: 'B.Sc. in Computer Science, Example State University',
  contact_email: 'avery@example.com',
  linkedin_profile: 'https://www.linkedin.com/in/avery-quinn-example',
  github_profile: 'https://github.com/avery-quinn-example',
  portfolio_website: 'https://avery.example.com',
  projects: [
    { name: 'Client Project: Bakery Ordering Site', description: 'Online ordering for a local bakery.' },
    { name: 'Trail Log', description: 'A hiking journal with offline maps.' },
    { name: 'Dental Clinic Dashboard (client project)', description: 'Appointment analytics for a clinic.' },
  ],
};

export const TEST_PROFILE_ALT: Profile = {
  name: 'Jordan Lee',
  occupation: 'Data Engineer',
  about_me: 'Pipelines, warehouses and the occasional dashboard.',
  skills: ['Scala', 'SQL'],
  education: 'M.Sc. in Data Science, Sample Institute',
  contact_email: 'jordan@example.org',
  linkedin_profile: 'https://www.linkedin.com/in/jordan-lee-example',
  github_profile: '',
  portfolio_website: '',
  projects: [{ name: 'Lakehouse Migration', description: 'Moved nightly batch jobs to streaming.' }],
};

/** Plain JSON document for a profile, as it would appear on disk. */
export function toProfileDocument(profile: Profile, overrides: Record<string, unknown> = {}): string {
  return JSON.stringify({ ...profile, ...overrides }, null, 2);
}
