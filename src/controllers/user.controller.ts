import { Request, Response } from 'express';
import { UserService } from '../services/user.service';
import { parseRequest } from '../middleware/validation.middleware';
import {
  changeStaffRoleSchema,
  createMemberSchema,
  createStaffSchema,
  extendMembershipSchema,
  listUsersSchema,
  payFineSchema,
  userIdSchema,
  userLoansSchema,
} from '../validators/user.validator';
import { createMutationResponse, createSuccessResponse } from '../utils/response-factory';
import { asyncHandler } from '../utils/async-handler';
import { formatCurrency, formatDate } from '../utils/dates';
import { serializeActivity, serializeLoan, serializeUser } from '../utils/serializers';

/**
 * User Controller
 *
 * HTTP request handlers for member and staff endpoints
 */
export class UserController {
  constructor(private userService: UserService) {}

  /**
   * POST /v1/users/members
   */
  registerMember = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(createMemberSchema, req);

    const { value: member, persisted } = await this.userService.registerMember({
      id: body.user_id,
      name: body.name,
      email: body.email,
      phone: body.phone,
    });

    res.status(201).json(createMutationResponse(serializeUser(member), persisted, 'Member registered'));
  });

  /**
   * POST /v1/users/staff
   */
  registerStaff = asyncHandler(async (req: Request, res: Response) => {
    const { body } = parseRequest(createStaffSchema, req);

    const { value: staff, persisted } = await this.userService.registerStaff({
      id: body.user_id,
      name: body.name,
      email: body.email,
      ...(body.staff_role !== undefined && { staffRole: body.staff_role }),
      ...(body.hire_date !== undefined && { hireDate: new Date(body.hire_date) }),
    });

    res.status(201).json(createMutationResponse(serializeUser(staff), persisted, 'Staff member registered'));
  });

  /**
   * GET /v1/users
   */
  listUsers = asyncHandler(async (req: Request, res: Response) => {
    const { query } = parseRequest(listUsersSchema, req);

    const users = await this.userService.listUsers(query.role);

    res.status(200).json(createSuccessResponse(users.map(serializeUser)));
  });

  /**
   * GET /v1/users/:id
   */
  getUser = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(userIdSchema, req);

    const user = await this.userService.getUser(params.id);

    res.status(200).json(createSuccessResponse(serializeUser(user)));
  });

  /**
   * DELETE /v1/users/:id
   */
  removeUser = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(userIdSchema, req);

    const { value: user, persisted } = await this.userService.removeUser(params.id);

    res.status(200).json(createMutationResponse(serializeUser(user), persisted, `User ${user.id} removed`));
  });

  /**
   * GET /v1/users/:id/loans
   * Active loans by default; `active=false` includes returned ones
   */
  getUserLoans = asyncHandler(async (req: Request, res: Response) => {
    const { params, query } = parseRequest(userLoansSchema, req);

    const loans = await this.userService.getUserLoans(params.id, query.active);

    res.status(200).json(createSuccessResponse(loans.map(serializeLoan)));
  });

  /**
   * GET /v1/users/:id/activity
   */
  getActivity = asyncHandler(async (req: Request, res: Response) => {
    const { params } = parseRequest(userIdSchema, req);

    const activity = await this.userService.getActivity(params.id);

    res.status(200).json(createSuccessResponse(serializeActivity(activity)));
  });

  /**
   * POST /v1/users/:id/fines/payments
   */
  payFine = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(payFineSchema, req);

    const { value, persisted } = await this.userService.payFine(params.id, body.amount);

    res.status(200).json(
      createMutationResponse(
        { ...serializeUser(value.member), amount_applied: value.amountApplied },
        persisted,
        `Payment of ${formatCurrency(value.amountApplied)} applied. Remaining balance: ${formatCurrency(value.member.finesOwed)}`
      )
    );
  });

  /**
   * POST /v1/users/:id/membership/extend
   */
  extendMembership = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(extendMembershipSchema, req);

    const { value: member, persisted } = await this.userService.extendMembership(params.id, body.days);

    res
      .status(200)
      .json(
        createMutationResponse(
          serializeUser(member),
          persisted,
          `Membership extended until ${formatDate(member.membershipExpiry)}`
        )
      );
  });

  /**
   * PATCH /v1/users/:id/staff-role
   */
  changeStaffRole = asyncHandler(async (req: Request, res: Response) => {
    const { params, body } = parseRequest(changeStaffRoleSchema, req);

    const { value: staff, persisted } = await this.userService.changeStaffRole(params.id, body.staff_role);

    res.status(200).json(createMutationResponse(serializeUser(staff), persisted, `Role changed to ${staff.staffRole}`));
  });
}
