/**
 * Built-in default templates
 * These are used when no user templates are provided
 */

/**
 * Default SVG page template
 *
 * Context: width, height, margin, fontSize, fontFamily, title, pageNumber,
 * pageCount, lines[] ({ text, y })
 */
export function getDefaultPageTemplate(): string {
  return `<svg xmlns="http://www.w3.org/2000/svg" width="{{width}}" height="{{height}}" viewBox="0 0 {{width}} {{height}}">
  <title>{{title}} ({{pageNumber}}/{{pageCount}})</title>
  <rect width="100%" height="100%" fill="white"/>
{{#each lines}}
  <text x="{{../margin}}" y="{{y}}" font-family="{{../fontFamily}}" font-size="{{../fontSize}}">{{text}}</text>
{{/each}}
</svg>
`;
}
