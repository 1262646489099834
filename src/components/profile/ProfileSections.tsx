import type { ReactNode } from 'react';
import { SECTION_KEYS, type Profile, type SectionKey } from '@profile-chat/chat-contract';
import { buildSectionLinks, categorizeProject } from '@profile-chat/chat-orchestrator';
import { BookOpen, FolderGit2, GraduationCap, Mail, User } from 'lucide-react';
import { CollapsibleSection } from '@/components/chat/CollapsibleSection';
import { getProfileContactLinks } from '@/lib/profile/contactLinks';
import { ContactLinks } from './ContactLinks';

type ProfileSectionsProps = {
  profile: Profile;
  defaultExpanded?: boolean;
};

const SECTION_ICONS: Record<SectionKey, ReactNode> = {
  about: <User className="h-3 w-3" />,
  skills: <BookOpen className="h-3 w-3" />,
  education: <GraduationCap className="h-3 w-3" />,
  projects: <FolderGit2 className="h-3 w-3" />,
  contact: <Mail className="h-3 w-3" />,
};

function renderSectionBody(key: SectionKey, profile: Profile): ReactNode {
  switch (key) {
    case 'about':
      return (
        <div className="space-y-1">
          <p className="text-white">{profile.occupation}</p>
          <p className="leading-relaxed">{profile.about_me}</p>
        </div>
      );
    case 'skills':
      return (
        <ul className="flex flex-wrap gap-2">
          {profile.skills.map((skill, index) => (
            <li key={`${index}-${skill}`} className="rounded-full border border-white/15 bg-white/5 px-3 py-1 text-xs">
              {skill}
            </li>
          ))}
        </ul>
      );
    case 'education':
      return <p className="leading-relaxed">{profile.education}</p>;
    case 'projects':
      if (!profile.projects.length) {
        return <p className="text-white/50">No projects listed.</p>;
      }
      return (
        <ul className="space-y-3">
          {profile.projects.map((project, index) => (
            <li key={`${index}-${project.name}`}>
              <p className="font-semibold text-white">
                {project.name} <span className="font-normal text-white/40">({categorizeProject(project)})</span>
              </p>
              <p className="leading-relaxed">{project.description}</p>
            </li>
          ))}
        </ul>
      );
    case 'contact':
      return <ContactLinks links={getProfileContactLinks(profile)} />;
  }
}

const SECTION_COUNTS: Partial<Record<SectionKey, (profile: Profile) => number>> = {
  skills: (profile) => profile.skills.length,
  projects: (profile) => profile.projects.length,
};

/** Anchored profile sections the assistant's navigation links point at. */
export function ProfileSections({ profile, defaultExpanded = false }: ProfileSectionsProps) {
  const links = buildSectionLinks(profile);

  return (
    <div className="mt-10 flex w-full max-w-3xl flex-col gap-4 border-t border-white/10 pt-6">
      {SECTION_KEYS.map((key) => {
        const link = links.find((candidate) => candidate.key === key);
        if (!link) return null;
        return (
          <CollapsibleSection
            key={key}
            title={link.label}
            anchorId={link.anchorId}
            icon={SECTION_ICONS[key]}
            count={SECTION_COUNTS[key]?.(profile)}
            defaultExpanded={defaultExpanded}
          >
            {renderSectionBody(key, profile)}
          </CollapsibleSection>
        );
      })}
    </div>
  );
}
