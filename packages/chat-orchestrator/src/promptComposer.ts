import {
  SECTION_ANCHORS,
  SECTION_KEYS,
  type Profile,
  type ProfileProject,
  type ProjectCategory,
  type SectionKey,
  type SectionLink,
} from '@profile-chat/chat-contract';

const CLIENT_PROJECT_MARKER = 'client project';

export function categorizeProject(project: Pick<ProfileProject, 'name'>): ProjectCategory {
  return project.name.toLowerCase().includes(CLIENT_PROJECT_MARKER) ? 'Client Project' : 'Personal Project';
}

const SECTION_LABELS: Record<SectionKey, (name: string) => string> = {
  about: (name) => `About ${name}`,
  skills: () => 'My Skills',
  education: () => 'My Education',
  projects: () => 'My Projects',
  contact: (name) => `Contact ${name}`,
};

export function buildSectionLinks(profile: Pick<Profile, 'name'>): SectionLink[] {
  return SECTION_KEYS.map((key) => ({
    key,
    anchorId: SECTION_ANCHORS[key],
    label: SECTION_LABELS[key](profile.name),
  }));
}

export function buildGreeting(profile: Pick<Profile, 'name'>): string {
  return `Hello! I am a chatbot assistant of ${profile.name}. I was created by ${profile.name} to help you learn more about their professional background. How can I assist you today? You can ask me about their **skills**, **projects**, **education**, or **how to get in touch**!`;
}

function buildIdentityStatement(name: string): string {
  return `You are an AI chatbot assistant of ${name}. You were created by ${name} to provide accurate and helpful information about ${name}'s professional background, skills, education, and projects. Always introduce yourself with this identity if asked 'who are you?' or similar questions.`;
}

function buildFactBlock(profile: Profile): string {
  return [
    `Here is key information about ${profile.name} for you to reference:`,
    `- **Name:** ${profile.name}`,
    `- **Occupation:** ${profile.occupation}`,
    `- **About Me:** ${profile.about_me}`,
    `- **Skills:** ${profile.skills.join(', ')}`,
    `- **Education:** ${profile.education}`,
    `- **Contact Email:** ${profile.contact_email}`,
    `- **LinkedIn:** ${profile.linkedin_profile}`,
    `- **GitHub:** ${profile.github_profile}`,
    `- **Portfolio Website:** ${profile.portfolio_website}`,
  ].join('\n');
}

function buildProjectListing(projects: readonly ProfileProject[]): string {
  const lines = projects.map(
    (project) => `- **${project.name} (${categorizeProject(project)})**: ${project.description}`
  );
  return ['**Projects:**', ...(lines.length ? lines : ['- No projects listed.'])].join('\n');
}

function buildBehaviorInstructions(name: string): string {
  return [
    `**Primary Goal:** Answer user questions about ${name}'s professional profile using the provided information.`,
    '',
    '**Specific Answering Instructions:**',
    '- If a user asks a factual question that can be directly answered from the provided information, *provide the answer directly and concisely*.',
    '- **For Projects:** If asked about "client projects", "personal projects", or "different types of projects", list the relevant projects by their name and a brief description, clearly indicating their type (Client/Personal).',
    '- If asked for a summary of a section (e.g., "summarize your skills"), provide a brief overview.',
    '- If asked for contact information, provide the email, LinkedIn, GitHub, and portfolio website directly.',
    '',
    '**General Chat Behavior:**',
    '- Be polite, concise, and helpful.',
    `- If the question is a general knowledge question not related to ${name}, answer it to the best of your ability using your general knowledge, but maintain your persona as ${name}'s assistant.`,
    `- Do not invent information about ${name} that is not explicitly provided. If you cannot find the answer in the provided information, simply state that you don't have that specific detail about ${name}.`,
  ].join('\n');
}

function buildNavigationInstructions(profile: Profile): string {
  const links = buildSectionLinks(profile).map((link) => `    - ${link.label}: [${link.label}](#${link.anchorId})`);
  return [
    '**Navigation/Link Instructions (for specific requests ONLY):**',
    '- The profile sections are collapsed on the page by default. If the user explicitly asks to "go to", "show me", or "take me to" a specific section (e.g., "show me your skills", "go to projects", "take me to the contact info"), provide a clickable Markdown link to that section.',
    '- **ONLY provide links if explicitly asked to navigate.** Otherwise, provide direct answers.',
    '- Here are the available sections and their corresponding anchor links:',
    ...links,
    '- If the user asks for the *content* of a section, answer directly first, and *then* you may offer the relevant link for "more details".',
  ].join('\n');
}

/**
 * Builds the complete prompt for a single turn. Only the latest user message is included;
 * earlier turns are never replayed to the model.
 */
export function composeProfilePrompt(profile: Profile, userQuery: string): string {
  return [
    buildIdentityStatement(profile.name),
    buildFactBlock(profile),
    buildProjectListing(profile.projects),
    buildBehaviorInstructions(profile.name),
    buildNavigationInstructions(profile),
    `User Query: ${userQuery}`,
  ].join('\n\n');
}
