'use client';

import { motion } from 'framer-motion';
import { Github, Globe, Linkedin, Mail, type LucideIcon } from 'lucide-react';
import { useState } from 'react';
import type { ContactLink, ContactPlatform } from '@/lib/profile/contactLinks';

const ICONS: Record<ContactPlatform, LucideIcon> = {
  email: Mail,
  linkedin: Linkedin,
  github: Github,
  website: Globe,
};

export function ContactLinks({ links }: { links: readonly ContactLink[] }) {
  const [hoveredIndex, setHoveredIndex] = useState<number | null>(null);

  if (!links.length) {
    return <p className="text-white/50">No contact details listed.</p>;
  }

  return (
    <ul className="flex flex-col gap-3">
      {links.map((link, i) => {
        const isHovered = hoveredIndex === i;
        const Icon = ICONS[link.platform];
        const external = link.platform !== 'email';
        return (
          <motion.li
            key={link.platform}
            className="flex items-center gap-3"
            initial={{ opacity: 0, y: 12 }}
            animate={{ opacity: 1, y: 0 }}
            transition={{ duration: 0.4, delay: i * 0.08, type: 'spring', stiffness: 200 }}
            onHoverStart={() => setHoveredIndex(i)}
            onHoverEnd={() => setHoveredIndex(null)}
          >
            <motion.span
              className="text-white"
              animate={{
                filter: isHovered
                  ? 'brightness(1.5) drop-shadow(0 0 8px rgba(255, 255, 255, 0.6))'
                  : 'brightness(1) drop-shadow(0 0 0px rgba(255, 255, 255, 0))',
              }}
              transition={{ duration: 0.2 }}
            >
              <Icon className="h-4 w-4" aria-hidden />
            </motion.span>
            <span className="w-36 font-mono text-xs uppercase tracking-wider text-white/50">{link.label}</span>
            <a
              href={link.url}
              target={external ? '_blank' : undefined}
              rel={external ? 'noopener noreferrer' : undefined}
              className="break-all text-blue-300 underline underline-offset-4 hover:text-blue-200"
            >
              {link.display}
            </a>
          </motion.li>
        );
      })}
    </ul>
  );
}
