import { useState } from 'react';
import { format, parseISO } from 'date-fns';
import { Calendar, ExternalLink, Quote } from 'lucide-react';
import type { Paper } from '@paperlens/shared';
import { Badge } from '../ui/badge';
import { Card, CardContent, CardHeader, CardTitle } from '../ui/card';

export const ABSTRACT_PREVIEW_LENGTH = 300;

export function formatPublishedDate(date: string | null): string {
  return date ? format(parseISO(date), 'MMM d, yyyy') : 'Date unknown';
}

interface PaperCardProps {
  paper: Paper;
  rank: number;
}

export function PaperCard({ paper, rank }: PaperCardProps) {
  const [expanded, setExpanded] = useState(false);
  const isLong = paper.abstract.length > ABSTRACT_PREVIEW_LENGTH;
  const abstract =
    isLong && !expanded ? `${paper.abstract.slice(0, ABSTRACT_PREVIEW_LENGTH).trimEnd()}...` : paper.abstract;

  return (
    <Card>
      <CardHeader>
        <div className="flex items-start justify-between gap-3">
          <CardTitle>
            <span className="mr-2 text-muted-foreground">{rank}.</span>
            <a href={paper.url} target="_blank" rel="noopener noreferrer" className="hover:underline">
              {paper.title}
            </a>
          </CardTitle>
          <Badge>{paper.source_name}</Badge>
        </div>
        <p className="text-sm text-muted-foreground">{paper.formatted_authors}</p>
        <div className="flex flex-wrap items-center gap-4 text-xs text-muted-foreground">
          <span className="inline-flex items-center gap-1">
            <Calendar className="h-3.5 w-3.5" />
            {formatPublishedDate(paper.published_date)}
          </span>
          {paper.citation_count !== undefined && (
            <span className="inline-flex items-center gap-1">
              <Quote className="h-3.5 w-3.5" />
              {paper.citation_count === 1 ? '1 citation' : `${paper.citation_count} citations`}
            </span>
          )}
          {paper.doi && (
            <a
              href={`https://doi.org/${paper.doi}`}
              target="_blank"
              rel="noopener noreferrer"
              className="inline-flex items-center gap-1 hover:underline"
            >
              <ExternalLink className="h-3.5 w-3.5" />
              DOI: {paper.doi}
            </a>
          )}
        </div>
      </CardHeader>
      <CardContent className="space-y-3">
        {abstract ? (
          <p className="text-sm leading-relaxed">{abstract}</p>
        ) : (
          <p className="text-sm italic text-muted-foreground">No abstract available</p>
        )}
        {isLong && (
          <button
            type="button"
            className="text-xs font-medium text-blue-600 hover:underline"
            onClick={() => setExpanded((value) => !value)}
          >
            {expanded ? 'Show less' : 'Show more'}
          </button>
        )}
        {paper.categories && paper.categories.length > 0 && (
          <div className="flex flex-wrap gap-1.5">
            {paper.categories.map((category) => (
              <Badge key={category} variant="outline">
                {category}
              </Badge>
            ))}
          </div>
        )}
      </CardContent>
    </Card>
  );
}
