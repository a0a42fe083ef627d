import { Router } from 'express';
import { MaintenanceController } from '../../controllers/maintenance.controller';
import { MaintenanceService } from '../../services/maintenance.service';
import { validate } from '../../middleware/validation.middleware';
import { fineRateSchema } from '../../validators/maintenance.validator';

/**
 * Maintenance routes (v1)
 */
export const createMaintenanceRouter = (maintenanceService: MaintenanceService): Router => {
  const router = Router();
  const maintenanceController = new MaintenanceController(maintenanceService);

  /**
   * @swagger
   * /v1/maintenance/statistics:
   *   get:
   *     summary: Catalog, user and loan counts
   *     tags: [Maintenance]
   *     responses:
   *       200:
   *         description: Library statistics
   */
  router.get('/statistics', maintenanceController.getStatistics);

  /**
   * @swagger
   * /v1/maintenance/integrity:
   *   get:
   *     summary: Scan for inconsistencies between loans, items and users
   *     tags: [Maintenance]
   *     responses:
   *       200:
   *         description: List of violations (empty when consistent)
   */
  router.get('/integrity', maintenanceController.validateIntegrity);

  /**
   * @swagger
   * /v1/maintenance/fine-rate:
   *   put:
   *     summary: Set the daily overdue fine rate
   *     tags: [Maintenance]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [daily_fine_rate]
   *             properties:
   *               daily_fine_rate:
   *                 type: number
   *                 minimum: 0
   *     responses:
   *       200:
   *         description: Rate updated; applies to fines computed from now on
   *       400:
   *         description: Negative rate
   */
  router.put('/fine-rate', validate(fineRateSchema), maintenanceController.setDailyFineRate);

  return router;
};
