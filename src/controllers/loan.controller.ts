import { Request, Response } from 'express';
import { LoanService } from '../services/loan.service';
import { parseRequest } from '../middleware/validation.middleware';
import { loanActionSchema, loanIdSchema } from '../validators/loan.validator';
import { createMutationResponse, createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { serializeLoan } from '../utils/serializers';

/**
 * Loan Controller
 *
 * HTTP request handlers for circulation endpoints
 */
export class LoanController {
  constructor(private loanService: LoanService) {}

  /**
   * POST /v1/loans/checkout
   */
  checkOut = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(loanActionSchema, req);

    const result = await this.loanService.checkOut(body.user_id, body.item_id);

    res.status(201).json(createMutationResponse(serializeLoan(result.loan), result.persisted, result.message));
  });

  /**
   * POST /v1/loans/checkin
   * Returns the loan together with the fine computed on return
   */
  checkIn = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(loanActionSchema, req);

    const result = await this.loanService.checkIn(body.user_id, body.item_id);

    res.status(200).json(
      createMutationResponse(
        {
          loan: serializeLoan(result.loan),
          fine: result.fine,
          fine_charged: result.fineCharged,
        },
        result.persisted,
        result.message
      )
    );
  });

  /**
   * POST /v1/loans/renew
   */
  renew = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(loanActionSchema, req);

    const result = await this.loanService.renew(body.user_id, body.item_id);

    res.status(200).json(createMutationResponse(serializeLoan(result.loan), result.persisted, result.message));
  });

  /**
   * GET /v1/loans/overdue
   */
  getOverdueLoans = asyncHandler(async (_req: Request, res: Response) => {
    const loans = await this.loanService.getOverdueLoans();

    res.status(200).json(createSuccessResponse(loans.map(serializeLoan)));
  });

  /**
   * GET /v1/loans/:id
   */
  getLoan = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(loanIdSchema, req);

    const loan = await this.loanService.getLoan(params.id);

    res.status(200).json(createSuccessResponse(serializeLoan(loan)));
  });
}
