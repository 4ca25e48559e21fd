/**
 * @fileoverview Scanner barrel exports
 *
 * @module domain/scanners
 */

export {
    radialScanPoints,
    scanRadialProfile,
    type LocalVerdict,
    type RadialScan,
} from "./RadialScanner.js";
export {
    locateRationalSurface,
    scanRationalSurfaces,
    type LocatedSurface,
    type SurfaceEntry,
    type SurfaceScan,
    type SurfaceSkipReason,
} from "./RationalSurfaceScanner.js";
