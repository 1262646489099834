import './globals.css';
import type { ReactNode } from 'react';
import type { Metadata } from 'next';
import { isProfileLoadError } from '@profile-chat/chat-contract';
import { geistMono } from './fonts';
import { Providers } from './providers';
import { ErrorBoundary } from '@/components/ErrorBoundary';
import { profileRepository } from '@/server/chat/bootstrap';

export const dynamic = 'force-dynamic';

export async function generateMetadata(): Promise<Metadata> {
  try {
    const profile = await profileRepository.getProfile();
    const title = `${profile.name}'s Profile Chat`;
    return {
      title,
      description: `Ask an assistant about ${profile.name}'s skills, education, projects, and contact details.`,
      openGraph: { type: 'website', locale: 'en_US', title },
      robots: { index: true, follow: true },
    };
  } catch (error) {
    if (isProfileLoadError(error)) {
      return { title: 'Profile Chat' };
    }
    throw error;
  }
}

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en" className={geistMono.variable}>
      <body className="bg-black font-geist-mono text-white">
        <ErrorBoundary>
          <Providers>{children}</Providers>
        </ErrorBoundary>
      </body>
    </html>
  );
}
