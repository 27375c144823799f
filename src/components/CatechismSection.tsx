import { memo } from 'react';
import type { ContentSection } from '@/lib/reader/types';

interface CatechismSectionProps {
  section: ContentSection;
}

export const CatechismSection = memo(function CatechismSection({ section }: CatechismSectionProps) {
  return (
    <section
      id={section.id}
      data-part={section.partId}
      className="catechism-section"
    >
      <h3 className="catechism-section-title">Lord&apos;s Day {section.page}</h3>
    </section>
  );
});
