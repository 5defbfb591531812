export const strokeStylesTemplate = `# inkframe scene: caps, joins and dashes
version: "0.1"
title: Stroke styles

canvas:
  width: 150
  height: 100

draw:
  # style-only statement: applies to everything below
  - fill: none
    stroke: "#111111"
    stroke_width: 4

  - cap: butt
    path: M10 85 L60 85
  - cap: round
    path: M10 72 L60 72
  - cap: square
    path: M10 59 L60 59

  - join: { type: miter, limit: 4, fallback: bevel }
    path: M80 55 L100 90 L120 55
  - join: round
    path: M80 15 L100 50 L120 15

  - cap: butt
    join: bevel
    stroke: "#dc2626"
    stroke_width: 1
    dashes: [4, 2]
    dash_offset: 1
    path: M10 30 C25 50 45 10 60 30

  - fill: "#6366f180"
    stroke: none
    fill_rule: evenodd
    path: M10 5 L60 5 L60 20 L10 20 Z M20 9 L50 9 L50 16 L20 16 Z
`;
