import { Router } from 'express';
import { UserController } from '../../controllers/user.controller';
import { UserService } from '../../services/user.service';
import { validate } from '../../middleware/validation.middleware';
import {
  changeStaffRoleSchema,
  createMemberSchema,
  createStaffSchema,
  extendMembershipSchema,
  listUsersSchema,
  payFineSchema,
  userIdSchema,
  userLoansSchema,
} from '../../validators/user.validator';

/**
 * User routes (v1)
 */
export const createUsersRouter = (userService: UserService): Router => {
  const router = Router();
  const userController = new UserController(userService);

  /**
   * @swagger
   * /v1/users/members:
   *   post:
   *     summary: Register a member
   *     tags: [Users]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [user_id, name, email]
   *             properties:
   *               user_id:
   *                 type: string
   *               name:
   *                 type: string
   *               email:
   *                 type: string
   *               phone:
   *                 type: string
   *     responses:
   *       201:
   *         description: Member registered
   *         content:
   *           application/json:
   *             schema:
   *               $ref: '#/components/schemas/User'
   *       400:
   *         description: Validation failed
   *       409:
   *         description: A user with this ID already exists
   */
  router.post('/members', validate(createMemberSchema), userController.registerMember);

  /**
   * @swagger
   * /v1/users/staff:
   *   post:
   *     summary: Register a staff member
   *     tags: [Users]
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [user_id, name, email]
   *             properties:
   *               user_id:
   *                 type: string
   *               name:
   *                 type: string
   *               email:
   *                 type: string
   *               staff_role:
   *                 type: string
   *                 enum: [Manager, Librarian]
   *                 default: Librarian
   *               hire_date:
   *                 type: string
   *                 format: date-time
   *     responses:
   *       201:
   *         description: Staff member registered
   *       409:
   *         description: A user with this ID already exists
   */
  router.post('/staff', validate(createStaffSchema), userController.registerStaff);

  /**
   * @swagger
   * /v1/users:
   *   get:
   *     summary: List users
   *     tags: [Users]
   *     parameters:
   *       - in: query
   *         name: role
   *         schema:
   *           type: string
   *           enum: [Member, Staff]
   *     responses:
   *       200:
   *         description: Users ordered by name
   */
  router.get('/', validate(listUsersSchema), userController.listUsers);

  /**
   * @swagger
   * /v1/users/{id}:
   *   get:
   *     summary: Get a user
   *     tags: [Users]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: User retrieved successfully
   *       404:
   *         description: User not found
   *   delete:
   *     summary: Remove a user with no active loans
   *     tags: [Users]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: User removed
   *       409:
   *         description: User has active loans
   */
  router.get('/:id', validate(userIdSchema), userController.getUser);
  router.delete('/:id', validate(userIdSchema), userController.removeUser);

  /**
   * @swagger
   * /v1/users/{id}/loans:
   *   get:
   *     summary: Loans of a user
   *     tags: [Users]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *       - in: query
   *         name: active
   *         description: Only open loans (default true)
   *         schema:
   *           type: boolean
   *     responses:
   *       200:
   *         description: Loans retrieved successfully
   */
  router.get('/:id/loans', validate(userLoansSchema), userController.getUserLoans);

  /**
   * @swagger
   * /v1/users/{id}/activity:
   *   get:
   *     summary: Loan activity summary for a user
   *     tags: [Users]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Counts, fines owed and the ten most recent loans
   */
  router.get('/:id/activity', validate(userIdSchema), userController.getActivity);

  /**
   * @swagger
   * /v1/users/{id}/fines/payments:
   *   post:
   *     summary: Pay toward a member's outstanding fines
   *     tags: [Users]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [amount]
   *             properties:
   *               amount:
   *                 type: number
   *                 exclusiveMinimum: 0
   *     responses:
   *       200:
   *         description: Payment applied; overpayment is not refunded
   *       409:
   *         description: User is not a member
   */
  router.post('/:id/fines/payments', validate(payFineSchema), userController.payFine);

  /**
   * @swagger
   * /v1/users/{id}/membership/extend:
   *   post:
   *     summary: Extend a membership
   *     tags: [Users]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [days]
   *             properties:
   *               days:
   *                 type: integer
   *                 minimum: 1
   *     responses:
   *       200:
   *         description: Membership extended
   *       409:
   *         description: User is not a member
   */
  router.post('/:id/membership/extend', validate(extendMembershipSchema), userController.extendMembership);

  /**
   * @swagger
   * /v1/users/{id}/staff-role:
   *   patch:
   *     summary: Change a staff member's role
   *     tags: [Users]
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: string
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [staff_role]
   *             properties:
   *               staff_role:
   *                 type: string
   *                 enum: [Manager, Librarian]
   *     responses:
   *       200:
   *         description: Role changed and permissions recomputed
   *       409:
   *         description: User is not a staff member
   */
  router.patch('/:id/staff-role', validate(changeStaffRoleSchema), userController.changeStaffRole);

  return router;
};
