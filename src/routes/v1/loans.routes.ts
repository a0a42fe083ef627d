import { Router } from 'express';
import { LoanController } from '../../controllers/loan.controller';
import { LoanService } from '../../services/loan.service';
import { validate } from '../../middleware/validation.middleware';
import { loanActionSchema, loanIdSchema } from '../../validators/loan.validator';

/**
 * Loan routes (v1)
 *
 * @swagger
 * components:
 *   requestBodies:
 *     LoanAction:
 *       required: true
 *       content:
 *         application/json:
 *           schema:
 *             type: object
 *             required: [user_id, item_id]
 *             properties:
 *               user_id:
 *                 type: string
 *               item_id:
 *                 type: string
 */
export const createLoansRouter = (loanService: LoanService): Router => {
  const router = Router();
  const loanController = new LoanController(loanService);

  /**
   * @swagger
   * /v1/loans/checkout:
   *   post:
   *     summary: Check out an item to a user
   *     tags: [Loans]
   *     requestBody:
   *       $ref: '#/components/requestBodies/LoanAction'
   *     responses:
   *       201:
   *         description: Loan created; the message carries the due date
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/Loan'
   *       404:
   *         description: User or item not found
   *       409:
   *         description: User cannot borrow, or the item is not available
   */
  router.post('/checkout', validate(loanActionSchema), loanController.checkOut);

  /**
   * @swagger
   * /v1/loans/checkin:
   *   post:
   *     summary: Return an item
   *     tags: [Loans]
   *     requestBody:
   *       $ref: '#/components/requestBodies/LoanAction'
   *     responses:
   *       200:
   *         description: Loan closed; fine computed and charged to members
   *       404:
   *         description: No active loan for this user and item
   */
  router.post('/checkin', validate(loanActionSchema), loanController.checkIn);

  /**
   * @swagger
   * /v1/loans/renew:
   *   post:
   *     summary: Renew an active loan
   *     tags: [Loans]
   *     requestBody:
   *       $ref: '#/components/requestBodies/LoanAction'
   *     responses:
   *       200:
   *         description: Due date extended by the item's loan period
   *       404:
   *         description: No active loan for this user and item
   *       409:
   *         description: Renewal denied (overdue or maximum renewals reached)
   */
  router.post('/renew', validate(loanActionSchema), loanController.renew);

  /**
   * @swagger
   * /v1/loans/overdue:
   *   get:
   *     summary: All open loans past their due date
   *     tags: [Loans]
   *     responses:
   *       200:
   *         description: Overdue loans with their accruing fines
   */
  router.get('/overdue', loanController.getOverdueLoans);

  /**
   * @swagger
   * /v1/loans/{id}:
   *   get:
   *     summary: Get a loan
   *     tags: [Loans]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Loan retrieved successfully
   *       404:
   *         description: Loan not found
   */
  router.get('/:id', validate(loanIdSchema), loanController.getLoan);

  return router;
};
