import { describe, it, expect, beforeEach } from 'vitest';
import {
  DEFAULT_STYLE,
  applySceneEvent,
  createSceneState,
  type MarkerGroup,
  type SceneState,
} from '@mapsync/shared';
import { SvgMapSurface } from '../src/render/svgSurface';

const SVG_NS = 'http://www.w3.org/2000/svg';

const sites: MarkerGroup = {
  id: 'sites',
  label: 'Sites',
  style: DEFAULT_STYLE,
  nodes: [
    { id: 'origin', label: 'Origin', coordinates: { lat: 0, lng: 0 } },
    { id: 'ne', label: 'North-east', coordinates: { lat: 45, lng: 90 } },
  ],
  visible: true,
};

function sceneWith(...groups: MarkerGroup[]): SceneState {
  return applySceneEvent(createSceneState('ops'), { kind: 'full_state', groups });
}

describe('SvgMapSurface', () => {
  let svg: SVGSVGElement;
  let surface: SvgMapSurface;

  beforeEach(() => {
    document.body.replaceChildren();
    svg = document.createElementNS(SVG_NS, 'svg');
    document.body.appendChild(svg);
    surface = new SvgMapSurface(svg);
  });

  function circles(groupId: string): Element[] {
    return [...svg.querySelectorAll(`[data-group="${groupId}"] circle`)];
  }

  it('projects every node of every group onto the bounding box', () => {
    surface.renderAll(sceneWith(sites));

    expect(svg.getAttribute('viewBox')).toBe('0 0 800 391');
    const [origin, ne] = circles('sites');
    expect(origin.getAttribute('data-marker')).toBe('origin');
    expect(origin.getAttribute('cx')).toBe('400');
    expect(origin.getAttribute('cy')).toBe('195.5');
    expect(origin.getAttribute('r')).toBe('3');
    expect(origin.getAttribute('fill')).toBe('#6b7280');
    expect(ne.getAttribute('cx')).toBe('600');
    expect(ne.getAttribute('cy')).toBe('97.75');
    expect(ne.querySelector('title')?.textContent).toBe('North-east');
  });

  it('paints the ocean from the theme', () => {
    surface.renderAll(sceneWith(sites));

    expect(svg.querySelector('[data-layer="ocean"]')?.getAttribute('fill')).toBe('#aaaaaa');
  });

  it('hides a group without removing its markers', () => {
    const scene = sceneWith(sites);
    surface.renderAll(scene);

    surface.setGroupVisible('sites', false);
    expect(svg.querySelector('[data-group="sites"]')?.getAttribute('visibility')).toBe('hidden');
    expect(circles('sites')).toHaveLength(2);

    surface.setGroupVisible('sites', true);
    expect(svg.querySelector('[data-group="sites"]')?.hasAttribute('visibility')).toBe(false);
  });

  it('replaces an existing marker in place and removes markers by id', () => {
    const scene = sceneWith(sites);
    surface.renderAll(scene);

    surface.upsertMarker(sites, { id: 'origin', label: 'Moved', coordinates: { lat: 0, lng: 180 } }, scene.config);
    expect(circles('sites').map((c) => c.getAttribute('cx'))).toEqual(['800', '600']);

    surface.removeMarker('sites', 'ne');
    expect(circles('sites').map((c) => c.getAttribute('data-marker'))).toEqual(['origin']);
  });

  it('draws gradient, glow and animation from the group style', () => {
    const styled: MarkerGroup = {
      ...sites,
      style: { ...DEFAULT_STYLE, gradient: true, glow: true, animation: 'pulse' },
    };
    surface.renderAll(sceneWith(styled));

    const [origin] = circles('sites');
    expect(origin.getAttribute('fill')).toBe('url(#mapsync-grad-sites)');
    expect(origin.getAttribute('filter')).toBe('url(#mapsync-glow)');
    expect(origin.querySelector('animate')?.getAttribute('attributeName')).toBe('r');
    expect(svg.querySelector('#mapsync-grad-sites')?.tagName).toBe('radialGradient');
  });

  it('gives groups whose ids differ only in punctuation their own gradients', () => {
    const gradient = { ...DEFAULT_STYLE, gradient: true };
    const dotted: MarkerGroup = { ...sites, id: 'a.b', style: { ...gradient, colour: '#111111' } };
    const underscored: MarkerGroup = { ...sites, id: 'a_b', style: { ...gradient, colour: '#222222' } };
    surface.renderAll(sceneWith(dotted, underscored));

    expect(circles('a.b')[0].getAttribute('fill')).toBe('url(#mapsync-grad-a_2e_b)');
    expect(circles('a_b')[0].getAttribute('fill')).toBe('url(#mapsync-grad-a_5f_b)');
    expect(svg.querySelectorAll('radialGradient')).toHaveLength(2);
    expect(svg.querySelector('#mapsync-grad-a_2e_b stop')?.getAttribute('stop-color')).toBe('#111111');
  });

  it('clears markers and marks the surface static', () => {
    surface.renderAll(sceneWith(sites));
    expect(svg.getAttribute('data-render-mode')).toBe('live');

    surface.clear();
    surface.showStatic();

    expect(svg.querySelectorAll('circle')).toHaveLength(0);
    expect(svg.getAttribute('data-render-mode')).toBe('static');
  });

  it('removes its own elements on dispose', () => {
    surface.renderAll(sceneWith(sites));
    surface.dispose();

    expect(svg.children).toHaveLength(0);
  });
});
