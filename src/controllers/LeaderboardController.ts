import { Request, Response } from 'express';
import Joi from 'joi';
import { rosterNames } from '../config/roster';
import { LeaderboardService } from '../services/LeaderboardService';
import { SUPPORTED_IMAGE_TYPES } from '../services/ocr';
import { SettingsOverride, SettingsService } from '../services/SettingsService';
import { AppError, ErrorKind } from '../types';
import { formatDate } from '../utils/date';
import { createSubmissionSchema, EntrySubmission, normalizeTimes } from '../validation/entries';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  ConfigurationMissing: 412,
  ProviderFailure: 502,
  EmptySubmission: 400,
};

export class LeaderboardController {
  private service: LeaderboardService;
  private settings: SettingsService;
  private submissionSchema: Joi.ObjectSchema<EntrySubmission>;

  private recentQuerySchema = Joi.object<{ limit?: number }>({
    limit: Joi.number().integer().min(1).max(100),
  });

  private settingsSchema = Joi.object<SettingsOverride>({
    supabaseUrl: Joi.string().trim().uri({ scheme: ['http', 'https'] }).allow(''),
    supabaseKey: Joi.string().trim().allow(''),
    ocrApiKey: Joi.string().trim().allow(''),
    ocrProvider: Joi.string().valid('ocrspace', 'tesseract'),
  });

  constructor(service: LeaderboardService, settings: SettingsService) {
    this.service = service;
    this.settings = settings;
    this.submissionSchema = createSubmissionSchema(service.getRoster());
  }

  /**
   * POST /leaderboard/extract - OCR an uploaded screenshot
   */
  extract = async (req: Request, res: Response): Promise<void> => {
    try {
      if (!req.is([...SUPPORTED_IMAGE_TYPES])) {
        res.status(415).json({
          error: 'Unsupported media type',
          message: 'Upload a JPG, PNG or BMP image',
        });
        return;
      }

      if (!Buffer.isBuffer(req.body) || req.body.length === 0) {
        res.status(400).json({ error: 'Validation failed', details: ['Image body is required'] });
        return;
      }

      const mimeType = req.get('content-type')?.split(';')[0].trim();
      const outcome = await this.service.extract(req.body, mimeType);

      if (outcome.error) {
        this.sendError(res, outcome.error, { text: '', times: {} });
        return;
      }

      const found = Object.keys(outcome.times).length;
      res.status(200).json({
        success: true,
        message: found > 0 ? `Found ${found} player time(s)` : 'No valid leaderboard data found in the image.',
        data: { text: outcome.text, times: outcome.times },
      });
    } catch (error) {
      this.sendInternalError(res, 'Failed to process image', error);
    }
  };

  /**
   * POST /leaderboard/entries - Submit edited or manually entered times
   */
  submit = async (req: Request, res: Response): Promise<void> => {
    try {
      const { error, value } = this.submissionSchema.validate(req.body, { abortEarly: false });

      if (error || !value) {
        res.status(400).json({
          error: 'Validation failed',
          details: error ? error.details.map((d) => d.message) : ['Request body is required'],
        });
        return;
      }

      const { times, errors } = normalizeTimes(value.times, this.service.getRoster());
      if (errors.length > 0) {
        res.status(400).json({ error: 'Validation failed', details: errors });
        return;
      }

      const date = value.date ?? formatDate(new Date());
      const result = await this.service.submit(times, date);

      if (!result.ok) {
        this.sendError(res, result.error);
        return;
      }

      res.status(201).json({
        success: true,
        message: `Successfully added record with ID ${result.value.id} for ${date}!`,
        data: result.value,
      });
    } catch (error) {
      this.sendInternalError(res, 'Failed to update leaderboard data', error);
    }
  };

  /**
   * GET /leaderboard/entries?limit=10 - Most recent submissions
   */
  getRecent = async (req: Request, res: Response): Promise<void> => {
    try {
      const { error, value } = this.recentQuerySchema.validate(req.query);

      if (error || !value) {
        res.status(400).json({
          error: 'Validation failed',
          details: error ? error.details.map((d) => d.message) : [],
        });
        return;
      }

      const result = await this.service.recent(value.limit);

      if (!result.ok) {
        this.sendError(res, result.error);
        return;
      }

      res.status(200).json({
        success: true,
        message: result.value.entries.length > 0 ? undefined : 'No recent entries found.',
        data: result.value,
        count: result.value.entries.length,
      });
    } catch (error) {
      this.sendInternalError(res, 'Failed to fetch recent entries', error);
    }
  };

  /**
   * GET /roster - Player names in roster order
   */
  getRoster = (_req: Request, res: Response): void => {
    res.status(200).json({
      success: true,
      data: rosterNames(this.service.getRoster()),
    });
  };

  /**
   * GET /settings - Which credentials are configured
   */
  getSettings = (_req: Request, res: Response): void => {
    res.status(200).json({ success: true, data: this.settings.status() });
  };

  /**
   * PUT /settings - Override credentials for the running process
   */
  updateSettings = (req: Request, res: Response): void => {
    const { error, value } = this.settingsSchema.validate(req.body ?? {});

    if (error || !value) {
      res.status(400).json({
        error: 'Validation failed',
        details: error ? error.details.map((d) => d.message) : [],
      });
      return;
    }

    res.status(200).json({ success: true, data: this.settings.update(value) });
  };

  /**
   * GET /health - Health check
   */
  healthCheck = (_req: Request, res: Response): void => {
    res.status(200).json({
      success: true,
      message: 'Crossword leaderboard service is healthy',
      timestamp: Date.now(),
    });
  };

  private sendError(res: Response, error: AppError, extra: Record<string, unknown> = {}): void {
    res.status(STATUS_BY_KIND[error.kind]).json({
      success: false,
      error: error.kind,
      message: error.message,
      ...extra,
    });
  }

  private sendInternalError(res: Response, message: string, error: unknown): void {
    console.error(`[LeaderboardController] ${message}:`, error);
    res.status(500).json({ error: 'Internal server error', message });
  }
}
