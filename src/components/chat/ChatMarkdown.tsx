'use client';

import ReactMarkdown, { type Components } from 'react-markdown';
import { cn } from '@/lib/utils';
import { anchorIdFromHref, requestSectionFocus } from '@/lib/profile/navigation';

type ChatMarkdownProps = {
  text: string;
  className?: string;
};

const components: Components = {
  p: ({ node, children, className: cls, ...props }) => (
    <p {...props} className={cn('mb-2 leading-relaxed text-white', cls)}>
      {children}
    </p>
  ),
  ul: ({ node, children, className: cls, ...props }) => (
    <ul {...props} className={cn('mb-2 list-disc space-y-1 pl-5 text-white/90 marker:text-white/50', cls)}>
      {children}
    </ul>
  ),
  ol: ({ node, children, className: cls, ...props }) => (
    <ol {...props} className={cn('mb-2 list-decimal space-y-1 pl-5 text-white/90', cls)}>
      {children}
    </ol>
  ),
  li: ({ node, children, className: cls, ...props }) => (
    <li {...props} className={cn('leading-relaxed text-white', cls)}>
      {children}
    </li>
  ),
  strong: ({ node, children, className: cls, ...props }) => (
    <strong {...props} className={cn('font-semibold text-white', cls)}>
      {children}
    </strong>
  ),
  em: ({ node, children, className: cls, ...props }) => (
    <em {...props} className={cn('text-white/80', cls)}>
      {children}
    </em>
  ),
  code: ({ node, children, className: cls, ...props }) => {
    if (!cls) {
      return (
        <code {...props} className="rounded bg-white/10 px-1 py-0.5 font-mono text-[0.85rem] text-amber-200">
          {children}
        </code>
      );
    }
    return (
      <pre className="mb-3 overflow-x-auto rounded-xl border border-white/10 bg-black/40 p-3 font-mono text-sm text-white">
        <code {...props} className={cls}>
          {children}
        </code>
      </pre>
    );
  },
  a: ({ node, children, href, className: cls, ...props }) => {
    const anchorId = anchorIdFromHref(href);
    const linkClass = cn('text-blue-300 underline underline-offset-4 hover:text-blue-200', cls);
    // Section links stay on the page and open the targeted section.
    if (anchorId) {
      return (
        <a {...props} href={href} className={linkClass} onClick={() => requestSectionFocus(anchorId)}>
          {children}
        </a>
      );
    }
    return (
      <a {...props} href={href} target="_blank" rel="noreferrer" className={linkClass}>
        {children}
      </a>
    );
  },
  blockquote: ({ node, children, className: cls, ...props }) => (
    <blockquote {...props} className={cn('mb-3 border-l-4 border-white/30 pl-3 italic text-white/80', cls)}>
      {children}
    </blockquote>
  ),
  hr: ({ node, className: cls, ...props }) => <hr {...props} className={cn('my-4 border-white/20', cls)} />,
};

export function ChatMarkdown({ text, className }: ChatMarkdownProps) {
  if (!text.trim()) {
    return null;
  }

  return (
    <div className={cn('chat-markdown text-sm leading-relaxed text-white', className)}>
      <ReactMarkdown components={components}>{text}</ReactMarkdown>
    </div>
  );
}
