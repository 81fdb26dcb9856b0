export interface Point {
  x: number;
  y: number;
}

export type Circle = {
  kind: "circle";
  center: Point;
  radius: number;
};

/** Axis-aligned rectangle given by two opposite corners, in any order. */
export type Rectangle = {
  kind: "rectangle";
  a: Point;
  b: Point;
};

export type RoundedRectangle = {
  kind: "roundedRectangle";
  a: Point;
  b: Point;
  radius: number;
};

export type Shape = Circle | Rectangle | RoundedRectangle;

export type ShapeKind = Shape["kind"];

export type Bounds = {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
};

export function point(x: number, y: number): Point {
  return { x, y };
}

export function circle(center: Point, radius: number): Circle {
  return { kind: "circle", center, radius };
}

export function rectangle(a: Point, b: Point): Rectangle {
  return { kind: "rectangle", a, b };
}

export function roundedRectangle(a: Point, b: Point, radius: number): RoundedRectangle {
  return { kind: "roundedRectangle", a, b, radius };
}

export function centeredRectangle(center: Point, width: number, height: number): Rectangle {
  return rectangle(
    { x: center.x - width / 2, y: center.y - height / 2 },
    { x: center.x + width / 2, y: center.y + height / 2 }
  );
}

export function shapeBounds(shape: Shape): Bounds {
  switch (shape.kind) {
    case "circle": {
      const r = Math.abs(shape.radius);
      return {
        minX: shape.center.x - r,
        minY: shape.center.y - r,
        maxX: shape.center.x + r,
        maxY: shape.center.y + r
      };
    }
    case "rectangle":
    case "roundedRectangle":
      return {
        minX: Math.min(shape.a.x, shape.b.x),
        minY: Math.min(shape.a.y, shape.b.y),
        maxX: Math.max(shape.a.x, shape.b.x),
        maxY: Math.max(shape.a.y, shape.b.y)
      };
  }
}

/**
 * Point-in-shape test in the shape's own space. Every shape here is simple and
 * closed, so non-zero and even-odd winding agree.
 */
export function shapeContains(shape: Shape, p: Point): boolean {
  switch (shape.kind) {
    case "circle": {
      const dx = p.x - shape.center.x;
      const dy = p.y - shape.center.y;
      return dx * dx + dy * dy <= shape.radius * shape.radius;
    }
    case "rectangle": {
      const b = shapeBounds(shape);
      return p.x >= b.minX && p.x <= b.maxX && p.y >= b.minY && p.y <= b.maxY;
    }
    case "roundedRectangle": {
      const b = shapeBounds(shape);
      if (p.x < b.minX || p.x > b.maxX || p.y < b.minY || p.y > b.maxY) return false;
      const r = Math.max(0, Math.min(shape.radius, (b.maxX - b.minX) / 2, (b.maxY - b.minY) / 2));
      if (r === 0) return true;
      const cx = Math.min(Math.max(p.x, b.minX + r), b.maxX - r);
      const cy = Math.min(Math.max(p.y, b.minY + r), b.maxY - r);
      const dx = p.x - cx;
      const dy = p.y - cy;
      return dx * dx + dy * dy <= r * r;
    }
  }
}
