import * as path from 'path';
import { errorMessage } from '../../utils/errors';
import { ExcludeMatcher } from '../../utils/ignore';
import { Logger, consoleLogger } from '../../utils/messages';
import { commonSuffixLength, isWithin, pathSegments } from '../../utils/paths';
import { DestinationIndex } from './DestinationIndex';

export type PlacementTier = 'direct' | 'suffix' | 'anchor' | 'flat';

export interface Placement {
  path: string;
  tier: PlacementTier;
}

export interface PlacementContext {
  sourceRoot: string;
  sourceRootName: string;
  destinationRoot: string;
  minSuffixMatch: number;
  index: DestinationIndex;
}

export type PlacementResolver = (
  historicalPath: string,
  context: PlacementContext
) => string | null | Promise<string | null>;

export interface PlacementStrategy {
  tier: PlacementTier;
  resolve: PlacementResolver;
}

/**
 * Same relative position when the file sits under the source root.
 */
export const directRemap: PlacementResolver = (historicalPath, context) => {
  if (!isWithin(historicalPath, context.sourceRoot)) {
    return null;
  }
  return path.join(context.destinationRoot, path.relative(context.sourceRoot, historicalPath));
};

/**
 * Existing destination file with the same name and the longest agreeing
 * run of parent directories; shallower paths win ties.
 */
export const suffixMatch: PlacementResolver = async (historicalPath, context) => {
  const candidates = await context.index.candidates(path.basename(historicalPath));
  if (candidates.length === 0) {
    return null;
  }

  const sourceParts = pathSegments(historicalPath);
  let best: string | null = null;
  let bestSuffix = -1;
  let bestDepth = Number.POSITIVE_INFINITY;

  for (const candidate of candidates) {
    const candidateParts = pathSegments(candidate);
    const suffix = commonSuffixLength(sourceParts, candidateParts);
    if (suffix > bestSuffix || (suffix === bestSuffix && candidateParts.length < bestDepth)) {
      best = candidate;
      bestSuffix = suffix;
      bestDepth = candidateParts.length;
    }
  }

  return best !== null && bestSuffix >= context.minSuffixMatch ? best : null;
};

/**
 * Re-root whatever follows the first folder named like the source root.
 */
export const anchorReconstruct: PlacementResolver = (historicalPath, context) => {
  if (!context.sourceRootName) {
    return null;
  }
  const segments = pathSegments(historicalPath);
  const anchor = segments.indexOf(context.sourceRootName);
  if (anchor === -1) {
    return null;
  }
  const rest = segments.slice(anchor + 1);
  if (rest.length === 0) {
    return path.join(context.destinationRoot, path.basename(historicalPath));
  }
  return path.join(context.destinationRoot, ...rest);
};

export const flatFallback: PlacementResolver = (historicalPath, context) =>
  path.join(context.destinationRoot, path.basename(historicalPath));

export const PLACEMENT_STRATEGIES: readonly PlacementStrategy[] = [
  { tier: 'direct', resolve: directRemap },
  { tier: 'suffix', resolve: suffixMatch },
  { tier: 'anchor', resolve: anchorReconstruct },
  { tier: 'flat', resolve: flatFallback },
];

export interface DestinationPlacerOptions {
  sourceRoot: string;
  destinationRoot: string;
  maxIndexFiles?: number;
  /** 1 accepts any namesake; 2 needs at least one agreeing directory */
  minSuffixMatch?: number;
  /** Make files written during the run visible to later lookups */
  refreshIndex?: boolean;
  isExcluded?: ExcludeMatcher;
  logger?: Logger;
}

/**
 * DestinationPlacer - decides where a historical file belongs inside a
 * destination tree that may have been reorganized since the history was
 * captured.
 */
export class DestinationPlacer {
  private readonly context: PlacementContext;
  private readonly refreshIndex: boolean;
  private readonly logger: Logger;

  constructor(options: DestinationPlacerOptions) {
    const sourceRoot = path.resolve(options.sourceRoot);
    const destinationRoot = path.resolve(options.destinationRoot);
    this.logger = options.logger ?? consoleLogger;
    this.refreshIndex = options.refreshIndex ?? false;
    this.context = {
      sourceRoot,
      sourceRootName: path.basename(sourceRoot),
      destinationRoot,
      minSuffixMatch: options.minSuffixMatch ?? 1,
      index: new DestinationIndex(destinationRoot, {
        maxFiles: options.maxIndexFiles,
        isExcluded: options.isExcluded,
        logger: this.logger,
      }),
    };
  }

  get index(): DestinationIndex {
    return this.context.index;
  }

  /**
   * Destination for `historicalPath`. Always yields a path: the flat
   * fallback accepts anything.
   */
  async chooseDest(historicalPath: string): Promise<Placement> {
    const resolved = path.resolve(historicalPath);

    // The index reflects the tree before this run's first write
    try {
      await this.context.index.build();
    } catch (error) {
      this.logger.warn(`could not index ${this.context.destinationRoot}: ${errorMessage(error)}`);
    }

    for (const strategy of PLACEMENT_STRATEGIES) {
      let result: string | null;
      try {
        result = await strategy.resolve(resolved, this.context);
      } catch (error) {
        this.logger.warn(
          `${strategy.tier} placement failed for ${resolved}: ${errorMessage(error)}`
        );
        continue;
      }
      if (result !== null) {
        return { path: result, tier: strategy.tier };
      }
    }

    return { path: path.join(this.context.destinationRoot, path.basename(resolved)), tier: 'flat' };
  }

  /**
   * Tell the placer a file was written. Only changes later lookups when
   * `refreshIndex` is enabled.
   */
  noteWritten(filePath: string): void {
    if (this.refreshIndex) {
      this.context.index.add(filePath);
    }
  }
}
