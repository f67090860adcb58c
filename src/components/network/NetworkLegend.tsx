import { cn } from '@/lib/utils';
import { EDGE_COLORS, NODE_STYLES } from '@/lib/network';

interface NetworkLegendProps {
  visible: boolean;
}

const NODE_TYPES = [
  { label: 'Company', color: NODE_STYLES.Company.color, shape: 'square' },
  { label: 'Director / Officer', color: NODE_STYLES.Person.color, shape: 'circle' },
  { label: 'PSC / Beneficial owner', color: NODE_STYLES.PSC.color, shape: 'diamond' },
] as const;

type Shape = (typeof NODE_TYPES)[number]['shape'];

function ShapeIcon({ shape, color, size = 14 }: { shape: Shape; color: string; size?: number }) {
  const half = size / 2;

  switch (shape) {
    case 'circle':
      return (
        <svg width={size} height={size} viewBox={`0 0 ${size} ${size}`}>
          <circle cx={half} cy={half} r={half - 1} fill={color} />
        </svg>
      );
    case 'diamond':
      return (
        <svg width={size} height={size} viewBox={`0 0 ${size} ${size}`}>
          <polygon
            points={`${half},1 ${size - 1},${half} ${half},${size - 1} 1,${half}`}
            fill={color}
          />
        </svg>
      );
    case 'square':
      return (
        <svg width={size} height={size} viewBox={`0 0 ${size} ${size}`}>
          <rect x={1} y={1} width={size - 2} height={size - 2} rx={2} fill={color} />
        </svg>
      );
  }
}

function EdgeSample({ color, dashed }: { color: string; dashed?: boolean }) {
  return (
    <svg width="20" height="2" viewBox="0 0 20 2">
      <line
        x1="0"
        y1="1"
        x2="20"
        y2="1"
        stroke={color}
        strokeWidth="2"
        strokeDasharray={dashed ? '4 2' : undefined}
      />
    </svg>
  );
}

export function NetworkLegend({ visible }: NetworkLegendProps) {
  if (!visible) return null;

  return (
    <div
      className={cn(
        'absolute right-3 top-3 z-20 rounded-lg border border-border-subtle',
        'bg-surface-raised/95 p-3 backdrop-blur-sm shadow-lg',
        'min-w-[200px]'
      )}
    >
      <h4 className="mb-2.5 text-xs font-semibold uppercase tracking-wider text-text-tertiary">
        Node Types
      </h4>
      <div className="flex flex-col gap-1.5">
        {NODE_TYPES.map((item) => (
          <div key={item.label} className="flex items-center gap-2">
            <ShapeIcon shape={item.shape} color={item.color} />
            <span className="text-xs text-text-secondary">{item.label}</span>
          </div>
        ))}
      </div>

      <div className="my-2.5 border-t border-border-subtle" />

      <h4 className="mb-2.5 text-xs font-semibold uppercase tracking-wider text-text-tertiary">
        Relationships
      </h4>
      <div className="flex flex-col gap-1.5">
        <div className="flex items-center gap-2">
          <EdgeSample color={EDGE_COLORS.DIRECTOR_OF} />
          <span className="text-xs text-text-secondary">Director of</span>
        </div>
        <div className="flex items-center gap-2">
          <EdgeSample color={EDGE_COLORS.CONTROLS} dashed />
          <span className="text-xs text-text-secondary">Controls</span>
        </div>
      </div>
    </div>
  );
}
