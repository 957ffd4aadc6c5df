export interface RenderConfig {
  /** Edge of one grid square in pixels (PNG) */
  cellSize: number;
  /** Blank margin around the grid in pixels (PNG) */
  padding: number;
  showAnswers: boolean;
  showNumbers: boolean;
  /** Document title printed above the grid (PDF) */
  title: string;
}

export const DEFAULT_RENDER_CONFIG: RenderConfig = {
  cellSize: 60,
  padding: 20,
  showAnswers: true,
  showNumbers: true,
  title: "Crossword Puzzle",
};
