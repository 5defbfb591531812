export const basicShapesTemplate = `# inkframe scene
# Lengths are millimeters unless suffixed (mm, cm, in, pt).
# Y points up; (0, 0) is the bottom-left corner of the canvas.
version: "0.1"
title: Basic shapes

canvas:
  width: 120
  height: 80

draw:
  - fill: "#f2f2f2"
    shape: { type: rect, width: 120, height: 80 }

  - x: 10
    y: 10
    fill: "#3b82f6"
    stroke: "#1e3a8a"
    stroke_width: 1.5
    shape: { type: rect, width: 40, height: 25, radius: 4 }

  - x: 85
    y: 25
    fill: "#f59e0b"
    stroke: none
    shape: { type: circle, r: 15 }

  - x: 60
    y: 60
    fill: "#10b981"
    shape: { type: polygon, sides: 6, r: 12 }
`;
