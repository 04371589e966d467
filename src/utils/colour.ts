export type Colour = readonly [r: number, g: number, b: number];
