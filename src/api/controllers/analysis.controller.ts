/**
 * Analysis controller - Evaluation, suggestions, blunder checks and game state
 */

import { Request, Response } from 'express';
import { z } from 'zod';
import { Position } from '../../engine/Position.js';
import {
  getPositionAnalysisService,
  PositionAnalysisService,
} from '../../services/PositionAnalysisService.js';
import {
  blunderRequestSchema,
  blunderScanRequestSchema,
  positionRequestSchema,
  suggestionsRequestSchema,
  validateRequest,
} from '../../utils/validation.js';
import { logger } from '../../utils/logger.js';

const analysisLogger = logger.child({ controller: 'analysis' });

export class AnalysisController {
  constructor(
    private readonly service: PositionAnalysisService = getPositionAnalysisService(),
  ) {}

  /**
   * POST /analysis/evaluate
   */
  evaluate(req: Request, res: Response): void {
    const { fen } = this.parse(positionRequestSchema, req.body);
    res.json({ fen, evaluation: this.service.evaluate(Position.fromFen(fen)) });
  }

  /**
   * POST /analysis/suggestions
   */
  suggestions(req: Request, res: Response): void {
    const { fen, k } = this.parse(suggestionsRequestSchema, req.body);
    const position = Position.fromFen(fen);

    res.json({
      fen,
      state: this.service.classifyState(position),
      suggestions: this.service.suggestMoves(position, k),
    });
  }

  /**
   * POST /analysis/blunder
   */
  blunder(req: Request, res: Response): void {
    const { fen, move, fenAfter, threshold } = this.parse(blunderRequestSchema, req.body);
    const before = Position.fromFen(fen);
    const after = fenAfter ? Position.fromFen(fenAfter) : undefined;

    const report = this.service.checkBlunder(before, move, after, threshold);
    if (report.isBlunder) {
      analysisLogger.info(
        { fen, move: report.playedMove, delta: report.delta, severity: report.severity },
        'Blunder reported',
      );
    }
    res.json(report);
  }

  /**
   * POST /analysis/blunders/scan
   */
  scan(req: Request, res: Response): void {
    const { fen, threshold } = this.parse(blunderScanRequestSchema, req.body);
    res.json(this.service.scanForBlunders(Position.fromFen(fen), threshold));
  }

  /**
   * POST /analysis/state
   */
  state(req: Request, res: Response): void {
    const { fen } = this.parse(positionRequestSchema, req.body);
    res.json({ fen, ...this.service.describeState(Position.fromFen(fen)) });
  }

  /**
   * POST /analysis/position
   */
  position(req: Request, res: Response): void {
    const { fen, k } = this.parse(suggestionsRequestSchema, req.body);
    res.json(this.service.analyzePosition(Position.fromFen(fen), k));
  }

  /**
   * Validation failures propagate to the error handler as ZodError (400)
   */
  private parse<T>(schema: z.ZodSchema<T>, body: unknown): T {
    const validation = validateRequest(schema, body);
    if (!validation.success) {
      throw validation.errors;
    }
    return validation.data;
  }
}
