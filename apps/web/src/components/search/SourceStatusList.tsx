import { SOURCE_LABELS } from '@paperlens/shared';
import type { SourceId, SourceResult } from '@paperlens/shared';
import { StatusIcon } from '../ui/status-icon';

interface SourceStatusListProps {
  sources: SourceId[];
  /** Missing while the search is still running */
  results?: Partial<Record<SourceId, SourceResult>>;
}

export function SourceStatusList({ sources, results }: SourceStatusListProps) {
  return (
    <ul className="flex flex-wrap gap-3" aria-label="Source status">
      {sources.map((id) => {
        const result = results?.[id];
        const status = !result ? 'running' : result.error ? 'failed' : 'completed';
        return (
          <li key={id} className="flex items-center gap-2 rounded-md border border-border px-3 py-1.5 text-sm">
            <StatusIcon status={status} size="sm" />
            <span className="font-medium">{SOURCE_LABELS[id]}</span>
            <span className="text-muted-foreground">
              {!result ? 'searching...' : result.error ? result.error : `${result.count} found`}
            </span>
          </li>
        );
      })}
    </ul>
  );
}
