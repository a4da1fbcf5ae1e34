import { Check, Loader2, X } from 'lucide-react';
import { cn } from '../../lib/utils';

type StatusIconSize = 'sm' | 'md';
export type StatusIconState = 'running' | 'completed' | 'failed';

interface StatusIconProps {
  status: StatusIconState;
  size?: StatusIconSize;
  className?: string;
}

const SIZE_STYLES: Record<StatusIconSize, { circle: string; icon: string }> = {
  sm: {
    circle: 'h-4 w-4 min-h-4 min-w-4',
    icon: 'h-3 w-3',
  },
  md: {
    circle: 'h-6 w-6 min-h-6 min-w-6',
    icon: 'h-3.5 w-3.5',
  },
};

const STATE_STYLES: Record<StatusIconState, string> = {
  running: 'border border-blue-200 bg-blue-50/50 text-blue-600',
  completed: 'bg-green-500 text-white',
  failed: 'bg-red-500 text-white',
};

const STATE_LABELS: Record<StatusIconState, string> = {
  running: 'Searching',
  completed: 'Done',
  failed: 'Failed',
};

export function StatusIcon({ status, size = 'md', className }: StatusIconProps) {
  const styles = SIZE_STYLES[size];
  const Icon = status === 'failed' ? X : status === 'running' ? Loader2 : Check;

  return (
    <span
      role="img"
      aria-label={STATE_LABELS[status]}
      className={cn(
        'inline-flex shrink-0 items-center justify-center rounded-full',
        STATE_STYLES[status],
        styles.circle,
        className
      )}
    >
      <Icon className={cn(styles.icon, status === 'running' && 'animate-spin')} strokeWidth={2.5} />
    </span>
  );
}
