// Contact sheet domain types (all lengths in PDF points unless noted)

export type FillOrder = 'reading-order' | 'film-strip-order'
export type UniformOrientation = 'none' | 'portrait' | 'landscape'
export type PageOrientation = 'portrait' | 'landscape'
export type LabelMode = 'none' | 'index' | 'name'

export interface Size {
  width: number
  height: number
}

export interface ImageRef {
  /** absolute path */
  readonly path: string
  readonly name: string
  readonly stem: string
}

export interface GridDimensions {
  readonly rows: number
  readonly cols: number
}

export interface GridOverrides {
  readonly rows?: number
  readonly cols?: number
}

export interface PageGeometry extends GridDimensions {
  readonly pageWidth: number
  readonly pageHeight: number
  readonly margin: number
  readonly gap: number
}

/** Half-open range [start, end) into the ordered image list */
export interface PageRange {
  readonly start: number
  readonly end: number
}

export interface Cell {
  readonly row: number
  readonly col: number
}

/** (x, y) is the cell's top-left corner, y growing downward as in pdfkit */
export interface CellPlacement extends Cell {
  readonly index: number
  readonly x: number
  readonly y: number
  readonly width: number
  readonly height: number
}

export interface ThumbnailFit {
  readonly width: number
  readonly height: number
  readonly offsetX: number
  readonly offsetY: number
}

export interface ContactSheetOptions {
  readonly inputDir: string
  readonly output: string
  readonly pageOrient: PageOrientation
  readonly uniformOrient: UniformOrientation
  readonly rows?: number
  readonly cols?: number
  readonly marginMm: number
  readonly gapMm: number
  readonly labels: LabelMode
  readonly order: FillOrder
}

export interface ContactSheetSummary {
  readonly output: string
  readonly imageCount: number
  readonly pageCount: number
  readonly rows: number
  readonly cols: number
  readonly pageOrient: PageOrientation
  readonly uniformOrient: UniformOrientation
  readonly marginMm: number
  readonly gapMm: number
  readonly labels: LabelMode
  readonly order: FillOrder
}
