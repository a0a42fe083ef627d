import { Request, Response } from 'express';
import { MaintenanceService } from '../services/maintenance.service';
import { parseRequest } from '../middleware/validation.middleware';
import { fineRateSchema } from '../validators/maintenance.validator';
import { createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { formatCurrency } from '../utils/dates';
import { serializeStatistics } from '../utils/serializers';

/**
 * Maintenance Controller
 *
 * HTTP request handlers for maintenance endpoints
 */
export class MaintenanceController {
  constructor(private maintenanceService: MaintenanceService) {}

  /**
   * GET /v1/maintenance/statistics
   */
  getStatistics = asyncHandler(async (_req: Request, res: Response) => {
    const stats = await this.maintenanceService.getStatistics();

    res.status(200).json(createSuccessResponse(serializeStatistics(stats)));
  });

  /**
   * GET /v1/maintenance/integrity
   * Diagnostic scan; violations are reported, never repaired
   */
  validateIntegrity = asyncHandler(async (_req: Request, res: Response) => {
    const violations = await this.maintenanceService.validateIntegrity();

    res.status(200).json(
      createSuccessResponse(
        {
          valid: violations.length === 0,
          violations: violations.map((violation) => ({
            kind: violation.kind,
            message: violation.message,
            loan_id: violation.loanId ?? null,
            item_id: violation.itemId ?? null,
            user_id: violation.userId ?? null,
          })),
        },
        violations.length === 0 ? 'No integrity violations found' : `Found ${violations.length} integrity violations`
      )
    );
  });

  /**
   * PUT /v1/maintenance/fine-rate
   */
  setDailyFineRate = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(fineRateSchema, req);

    const rate = await this.maintenanceService.setDailyFineRate(body.daily_fine_rate);

    res
      .status(200)
      .json(createSuccessResponse({ daily_fine_rate: rate }, `Daily fine rate set to ${formatCurrency(rate)}`));
  });
}
