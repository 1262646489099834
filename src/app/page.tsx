import { isProfileLoadError, type Profile, type ProfileErrorCode } from '@profile-chat/chat-contract';
import { buildGreeting } from '@profile-chat/chat-orchestrator';
import { ChatProvider } from '@profile-chat/chat-next-ui';
import ChatDock from '@/components/chat/ChatDock';
import { AppManagementPanel } from '@/components/AppManagementPanel';
import { ProfileSections } from '@/components/profile/ProfileSections';
import { ProfileUnavailable } from '@/components/profile/ProfileUnavailable';
import { chatConfig, profileRepository } from '@/server/chat/bootstrap';

export const dynamic = 'force-dynamic';

type PageProfile = { ok: true; profile: Profile } | { ok: false; code: ProfileErrorCode; message: string };

async function loadProfileForPage(): Promise<PageProfile> {
  try {
    return { ok: true, profile: await profileRepository.getProfile() };
  } catch (error) {
    if (isProfileLoadError(error)) {
      return { ok: false, code: error.code, message: error.message };
    }
    throw error;
  }
}

export default async function Home() {
  const result = await loadProfileForPage();

  if (!result.ok) {
    // Without a profile there is nothing to chat about; only the reload control stays.
    return (
      <main className="mx-auto flex max-w-3xl flex-col items-stretch px-4 py-10">
        <ProfileUnavailable code={result.code} message={result.message} />
        <AppManagementPanel />
      </main>
    );
  }

  const { profile } = result;

  return (
    <main className="mx-auto flex max-w-3xl flex-col items-stretch px-4 py-10">
      <header className="mb-8">
        <h1 className="text-2xl font-semibold text-white">Hi, I&apos;m {profile.name}&apos;s AI Assistant!</h1>
        <p className="mt-2 text-sm text-white/60">
          Ask me anything about {profile.name}&apos;s skills, experience, projects, or how to get in touch.
        </p>
      </header>
      <ChatProvider greeting={buildGreeting(profile)}>
        <ChatDock profileName={profile.name} />
      </ChatProvider>
      <ProfileSections profile={profile} defaultExpanded={chatConfig.display.sectionsExpanded} />
      <AppManagementPanel />
    </main>
  );
}
