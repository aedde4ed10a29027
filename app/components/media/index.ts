export { CastRow } from "./CastRow";
export { DetailPanel } from "./DetailPanel";
export { InsightCard } from "./InsightCard";
export { MediaGrid } from "./MediaGrid";
export { PosterCard } from "./PosterCard";
