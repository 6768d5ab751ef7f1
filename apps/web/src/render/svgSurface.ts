// ─── SVG Map Surface ─────────────────────────────────────
// Draws marker groups onto an <svg> basemap. Each group is a <g data-group>
// holding one <circle data-marker> per node; the theme is exposed to the
// host stylesheet as --map-* custom properties.

import {
  THEME_KEYS,
  describeColour,
  projectCoordinates,
  type MapTheme,
  type MarkerGroup,
  type MarkerStyle,
  type PlacedNode,
  type SceneConfig,
  type SceneState,
  type ThemeKey,
} from '@mapsync/shared';
import type { RenderSurface } from './RenderSurface';

const SVG_NS = 'http://www.w3.org/2000/svg';
const GLOW_FILTER_ID = 'mapsync-glow';

const THEME_PROPERTIES: Record<ThemeKey, string> = {
  land: '--map-land',
  ocean: '--map-ocean',
  border: '--map-border',
  neutralMarker: '--map-neutral-marker',
  neutralText: '--map-neutral-text',
};

function svgElement<K extends keyof SVGElementTagNameMap>(
  doc: Document,
  tag: K,
  attrs: Record<string, string | number> = {},
): SVGElementTagNameMap[K] {
  const el = doc.createElementNS(SVG_NS, tag);
  for (const [name, value] of Object.entries(attrs)) el.setAttribute(name, String(value));
  return el;
}

/** Escapes every character outside [A-Za-z0-9-] as `_<hex>_`, so distinct group ids never collide. */
function gradientId(groupId: string): string {
  return `mapsync-grad-${groupId.replace(/[^A-Za-z0-9-]/g, (ch) => `_${ch.charCodeAt(0).toString(16)}_`)}`;
}

export class SvgMapSurface implements RenderSurface {
  private readonly svg: SVGSVGElement;
  private readonly doc: Document;
  private readonly defs: SVGDefsElement;
  private readonly background: SVGRectElement;
  private readonly layer: SVGGElement;

  constructor(svg: SVGSVGElement) {
    this.svg = svg;
    this.doc = svg.ownerDocument;

    this.defs = svgElement(this.doc, 'defs', { 'data-mapsync': 'defs' });
    const filter = svgElement(this.doc, 'filter', { id: GLOW_FILTER_ID });
    filter.appendChild(svgElement(this.doc, 'feGaussianBlur', { stdDeviation: 2.5 }));
    this.defs.appendChild(filter);

    this.background = svgElement(this.doc, 'rect', { 'data-layer': 'ocean', width: '100%', height: '100%' });
    this.layer = svgElement(this.doc, 'g', { 'data-layer': 'markers' });

    svg.prepend(this.background);
    svg.prepend(this.defs);
    svg.appendChild(this.layer);
    svg.setAttribute('data-render-mode', 'live');
  }

  renderAll(scene: SceneState): void {
    const { minX, minY, maxX, maxY } = scene.config.bbox;
    this.svg.setAttribute('viewBox', `${minX} ${minY} ${maxX - minX} ${maxY - minY}`);
    this.clear();
    this.applyTheme(scene.theme);
    for (const group of scene.groups) this.renderGroup(group, scene.config);
  }

  renderGroup(group: MarkerGroup, config: SceneConfig): void {
    const g = this.groupElement(group.id) ?? this.createGroup(group.id);
    g.replaceChildren();
    g.setAttribute('data-label', group.label);
    this.setVisibility(g, group.visible);
    this.syncGradient(group);
    for (const node of group.nodes) g.appendChild(this.markerElement(group, node, config));
  }

  upsertMarker(group: MarkerGroup, node: PlacedNode, config: SceneConfig): void {
    const g = this.groupElement(group.id);
    if (!g) {
      this.renderGroup(group, config);
      return;
    }
    const marker = this.markerElement(group, node, config);
    const existing = this.findMarker(g, node.id);
    if (existing) existing.replaceWith(marker);
    else g.appendChild(marker);
  }

  removeMarker(groupId: string, markerId: string): void {
    const g = this.groupElement(groupId);
    if (g) this.findMarker(g, markerId)?.remove();
  }

  setGroupVisible(groupId: string, visible: boolean): void {
    const g = this.groupElement(groupId);
    if (g) this.setVisibility(g, visible);
  }

  applyTheme(theme: MapTheme): void {
    for (const key of THEME_KEYS) this.svg.style.setProperty(THEME_PROPERTIES[key], theme[key]);
    this.background.setAttribute('fill', theme.ocean);
  }

  clear(): void {
    this.layer.replaceChildren();
    for (const gradient of this.defs.querySelectorAll('radialGradient')) gradient.remove();
  }

  showStatic(): void {
    this.svg.setAttribute('data-render-mode', 'static');
  }

  /** Remove everything this surface added to the element. */
  dispose(): void {
    this.defs.remove();
    this.background.remove();
    this.layer.remove();
  }

  // ─── Internals ─────────────────────────────────────────

  private groupElement(groupId: string): Element | undefined {
    for (const child of this.layer.children) {
      if (child.getAttribute('data-group') === groupId) return child;
    }
    return undefined;
  }

  private createGroup(groupId: string): Element {
    const g = svgElement(this.doc, 'g', { 'data-group': groupId });
    this.layer.appendChild(g);
    return g;
  }

  private findMarker(g: Element, markerId: string): Element | undefined {
    for (const child of g.children) {
      if (child.getAttribute('data-marker') === markerId) return child;
    }
    return undefined;
  }

  private setVisibility(g: Element, visible: boolean): void {
    if (visible) g.removeAttribute('visibility');
    else g.setAttribute('visibility', 'hidden');
  }

  private syncGradient(group: MarkerGroup): void {
    const id = gradientId(group.id);
    this.defs.querySelector(`#${id}`)?.remove();
    if (!group.style.gradient) return;

    const gradient = svgElement(this.doc, 'radialGradient', { id });
    gradient.appendChild(svgElement(this.doc, 'stop', { offset: '0%', 'stop-color': group.style.colour }));
    gradient.appendChild(
      svgElement(this.doc, 'stop', { offset: '100%', 'stop-color': group.style.colour, 'stop-opacity': 0.2 }),
    );
    this.defs.appendChild(gradient);
  }

  private markerElement(group: MarkerGroup, node: PlacedNode, config: SceneConfig): SVGCircleElement {
    const { x, y } = projectCoordinates(node.coordinates, config.bbox);
    const { style } = group;
    const circle = svgElement(this.doc, 'circle', {
      'data-marker': node.id,
      cx: x,
      cy: y,
      r: style.size / 2,
    });

    this.paint(circle, group.id, style);
    if (style.glow) circle.setAttribute('filter', `url(#${GLOW_FILTER_ID})`);

    const title = svgElement(this.doc, 'title');
    title.textContent = node.label;
    circle.appendChild(title);

    const animation = this.animation(style);
    if (animation) circle.appendChild(animation);
    return circle;
  }

  private paint(circle: SVGCircleElement, groupId: string, style: MarkerStyle): void {
    if (style.gradient) {
      circle.setAttribute('fill', `url(#${gradientId(groupId)})`);
      return;
    }
    // var() only resolves inside style, not presentation attributes
    if (describeColour(style.colour) === 'variable') circle.setAttribute('style', `fill: ${style.colour}`);
    else circle.setAttribute('fill', style.colour);
  }

  private animation(style: MarkerStyle): SVGElement | null {
    const r = style.size / 2;
    switch (style.animation) {
      case 'pulse':
        return svgElement(this.doc, 'animate', {
          attributeName: 'r',
          values: `${r};${r * 1.6};${r}`,
          dur: '1.5s',
          repeatCount: 'indefinite',
        });
      case 'fade':
        return svgElement(this.doc, 'animate', {
          attributeName: 'opacity',
          values: '1;0.3;1',
          dur: '2s',
          repeatCount: 'indefinite',
        });
      case 'bounce':
        return svgElement(this.doc, 'animateTransform', {
          attributeName: 'transform',
          type: 'translate',
          values: `0 0;0 ${-r};0 0`,
          dur: '0.8s',
          repeatCount: 'indefinite',
        });
      case 'none':
        return null;
    }
  }
}
