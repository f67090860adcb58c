import { useEffect, useRef, useCallback } from 'react';
import cytoscape, { type Core, type LayoutOptions, type StylesheetStyle } from 'cytoscape';
import type { CompanyNetwork } from '@/types';
import { circularLayoutByType, companyRootIds, toCytoscapeElements } from '@/lib/network';
import { useSession } from '@/stores/SessionProvider';
import { LoadingSpinner } from '@/components/shared';

export type GraphLayoutName = 'cose' | 'typed-circle' | 'hierarchy' | 'grid';

interface NetworkGraphProps {
  data: CompanyNetwork | null;
  isLoading: boolean;
  layoutName: GraphLayoutName;
}

const TYPED_CIRCLE_SCALE = 3;

function buildStylesheet(): StylesheetStyle[] {
  return [
    {
      selector: 'node',
      style: {
        label: 'data(label)',
        color: '#E8E8F0',
        'text-valign': 'bottom',
        'text-margin-y': 8,
        'font-size': 11,
        'font-family': 'Inter, system-ui, sans-serif',
        width: 'data(size)',
        height: 'data(size)',
        'background-color': 'data(color)',
        'border-width': 0,
        'text-outline-color': '#12121A',
        'text-outline-width': 2,
        'overlay-padding': 6,
      },
    },
    { selector: 'node[type="Company"]', style: { shape: 'round-rectangle' } },
    { selector: 'node[type="Person"]', style: { shape: 'ellipse' } },
    { selector: 'node[type="PSC"]', style: { shape: 'diamond' } },
    {
      selector: 'node:selected',
      style: {
        'border-width': 3,
        'border-color': '#FFFFFF',
      },
    },
    {
      selector: 'node.highlighted',
      style: {
        'border-width': 2,
        'border-color': '#4A9EFF',
      },
    },
    { selector: 'node.dimmed', style: { opacity: 0.2 } },
    {
      selector: 'edge',
      style: {
        width: 2,
        'line-color': 'data(edgeColor)',
        'target-arrow-color': 'data(edgeColor)',
        'target-arrow-shape': 'triangle',
        'arrow-scale': 0.8,
        'curve-style': 'bezier',
        opacity: 0.7,
        'font-size': 9,
        color: '#A0A0B8',
        'text-outline-color': '#12121A',
        'text-outline-width': 1.5,
      },
    },
    { selector: 'edge[relationship="CONTROLS"]', style: { 'line-style': 'dashed' } },
    {
      selector: 'edge.highlighted',
      style: {
        label: 'data(label)',
        'font-size': 10,
        opacity: 1,
        width: 3,
      },
    },
    { selector: 'edge.dimmed', style: { opacity: 0.08 } },
  ];
}

function getLayoutConfig(name: GraphLayoutName, data: CompanyNetwork): LayoutOptions {
  switch (name) {
    case 'typed-circle':
      return {
        name: 'preset',
        positions: circularLayoutByType(data, TYPED_CIRCLE_SCALE),
        animate: true,
        animationDuration: 600,
        padding: 50,
      };
    case 'hierarchy':
      return {
        name: 'breadthfirst',
        animate: true,
        animationDuration: 600,
        directed: false,
        roots: companyRootIds(data),
        padding: 50,
      };
    case 'grid':
      return {
        name: 'grid',
        animate: true,
        animationDuration: 600,
        padding: 50,
      };
    case 'cose':
    default:
      return {
        name: 'cose',
        animate: true,
        animationDuration: 800,
        nodeRepulsion: () => 8000,
        idealEdgeLength: () => 120,
        gravity: 0.3,
        padding: 50,
      };
  }
}

export function NetworkGraph({ data, isLoading, layoutName }: NetworkGraphProps) {
  const cyRef = useRef<Core | null>(null);
  const containerRef = useRef<HTMLDivElement>(null);
  const selectNode = useSession((s) => s.selectNode);

  const setCursor = (cursor: string) => {
    if (containerRef.current) containerRef.current.style.cursor = cursor;
  };

  const initCytoscape = useCallback(() => {
    if (!containerRef.current) return;

    cyRef.current?.destroy();
    cyRef.current = cytoscape({
      container: containerRef.current,
      style: buildStylesheet(),
      layout: { name: 'preset' },
      minZoom: 0.2,
      maxZoom: 5,
      wheelSensitivity: 0.3,
    });

    const cy = cyRef.current;

    cy.on('tap', 'node', (evt) => {
      selectNode(String(evt.target.id()));
    });

    cy.on('mouseover', 'node', (evt) => {
      const node = evt.target;
      const connectedEdges = node.connectedEdges();
      const connectedNodes = connectedEdges.connectedNodes();

      cy.elements().addClass('dimmed');
      node.removeClass('dimmed').addClass('highlighted');
      connectedEdges.removeClass('dimmed').addClass('highlighted');
      connectedNodes.removeClass('dimmed').addClass('highlighted');
      setCursor('pointer');
    });

    cy.on('mouseout', 'node', () => {
      cy.elements().removeClass('dimmed').removeClass('highlighted');
      setCursor('default');
    });

    cy.on('tap', (evt) => {
      if (evt.target === cy) {
        cy.elements().removeClass('dimmed').removeClass('highlighted');
        selectNode(null);
      }
    });
  }, [selectNode]);

  useEffect(() => {
    initCytoscape();
    return () => {
      cyRef.current?.destroy();
      cyRef.current = null;
    };
  }, [initCytoscape]);

  const renderGraph = useCallback(() => {
    const cy = cyRef.current;
    if (!cy) return;
    cy.elements().remove();
    if (!data) return;
    cy.add(toCytoscapeElements(data));
    cy.layout(getLayoutConfig(layoutName, data)).run();
  }, [data, layoutName]);

  useEffect(() => {
    renderGraph();
  }, [renderGraph]);

  useEffect(() => {
    const handleFit = () => cyRef.current?.fit(undefined, 50);
    const handleReset = () => {
      renderGraph();
      cyRef.current?.fit(undefined, 50);
    };

    window.addEventListener('network-fit', handleFit);
    window.addEventListener('network-reset', handleReset);

    return () => {
      window.removeEventListener('network-fit', handleFit);
      window.removeEventListener('network-reset', handleReset);
    };
  }, [renderGraph]);

  return (
    <div className="relative h-full flex-1 overflow-hidden rounded-lg border border-border-subtle bg-surface-sunken">
      {isLoading && (
        <div className="absolute inset-0 z-10 flex items-center justify-center bg-surface-base/60 backdrop-blur-sm">
          <LoadingSpinner size="lg" label="Building network…" />
        </div>
      )}
      {(!data || data.nodes.length === 0) && !isLoading && (
        <div className="absolute inset-0 z-10 flex flex-col items-center justify-center gap-3">
          <p className="text-sm text-text-disabled">
            {data
              ? `No companies could be expanded for "${data.metadata.searchQuery}".`
              : 'Search for a company to map its directors and controllers'}
          </p>
        </div>
      )}
      <div ref={containerRef} className="h-full w-full" style={{ minHeight: '500px' }} />
    </div>
  );
}
