export type DifficultyLevel = 'easy' | 'medium' | 'hard' | 'expert';

export const difficultyLevels: readonly DifficultyLevel[] = ['easy', 'medium', 'hard', 'expert'];

export type DifficultyConfig = {
    level: DifficultyLevel;
    // Cell removal stops once the puzzle is down to this many clues
    targetClues: number;
    // Puzzles rated below this score are generated again, up to GenerateOptions.maxAttempts
    minScore: number;
};

const difficultyConfigs: Record<DifficultyLevel, DifficultyConfig> = {
    easy: { level: 'easy', targetClues: 40, minScore: 0 },
    medium: { level: 'medium', targetClues: 32, minScore: 0 },
    hard: { level: 'hard', targetClues: 28, minScore: 60 },
    expert: { level: 'expert', targetClues: 24, minScore: 80 },
};

// Rating scores at or above which a puzzle falls into each bucket
const bucketThresholds: [DifficultyLevel, number][] = [
    ['expert', 110],
    ['hard', 80],
    ['medium', 60],
];

export function difficultyConfig(level: DifficultyLevel): DifficultyConfig {
    return { ...difficultyConfigs[level] };
}

export function isDifficultyLevel(value: string): value is DifficultyLevel {
    return difficultyLevels.some(level => level === value);
}

export function parseDifficulty(text: string): DifficultyLevel | null {
    const level = text.trim().toLowerCase();
    return isDifficultyLevel(level) ? level : null;
}

export function bucketForScore(score: number): DifficultyLevel {
    for (const [level, threshold] of bucketThresholds) {
        if (score >= threshold) {
            return level;
        }
    }
    return 'easy';
}
