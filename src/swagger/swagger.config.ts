import swaggerJsdoc from 'swagger-jsdoc';
import { env, libraryPolicy } from '../config/environment';

/**
 * Swagger/OpenAPI Configuration
 *
 * Generates OpenAPI 3.0 specification from JSDoc comments in route files
 */
const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Library Catalog API',
      version: '1.0.0',
      description: `
Circulation service for a library catalog of books, magazines and DVDs.

## Loan periods
- Book: 21 days
- Magazine: 7 days
- DVD: 14 days

## Circulation rules
- Members may hold 5 items; Managers 20 and Librarians 15
- Members with an expired membership or more than ${libraryPolicy.fineBlockThreshold.toFixed(2)} in unpaid fines cannot borrow
- A loan can be renewed twice, and never once it is overdue
- Overdue fines accrue per whole day late (currently ${libraryPolicy.dailyFineRate.toFixed(2)} per day) and are charged to members on return

## Loan lifecycle
1. **ACTIVE**: created at checkout
2. **OVERDUE**: derived from the clock once the due date has passed
3. **RETURNED**: terminal; the fine is frozen at return time
      `.trim(),
    },
    servers: [
      {
        url: `http://localhost:${env.PORT}`,
        description: env.NODE_ENV === 'production' ? 'Production server' : 'Development server',
      },
    ],
    tags: [
      { name: 'Items', description: 'Catalog management' },
      { name: 'Users', description: 'Members, staff and their accounts' },
      { name: 'Loans', description: 'Checkout, check-in and renewal' },
      { name: 'Maintenance', description: 'Statistics, integrity and fine policy' },
    ],
    components: {
      schemas: {
        Item: {
          type: 'object',
          properties: {
            item_id: { type: 'string' },
            title: { type: 'string' },
            item_type: { type: 'string', enum: ['Book', 'Magazine', 'DVD'] },
            is_available: { type: 'boolean' },
            date_added: { type: 'string', format: 'date-time' },
            loan_period_days: { type: 'integer', description: 'Derived from the item type' },
            author: { type: 'string', nullable: true },
            isbn: { type: 'string', nullable: true },
            pages: { type: 'integer', nullable: true },
            issue_number: { type: 'string', nullable: true },
            publisher: { type: 'string', nullable: true },
            publication_date: { type: 'string', format: 'date-time', nullable: true },
            duration: { type: 'integer', nullable: true, description: 'DVD running time in minutes' },
            genre: { type: 'string', nullable: true },
            director: { type: 'string', nullable: true },
            rating: { type: 'string', nullable: true, enum: ['G', 'PG', 'PG-13', 'R', 'NC-17', 'NR'] },
          },
        },
        User: {
          type: 'object',
          properties: {
            user_id: { type: 'string' },
            name: { type: 'string' },
            email: { type: 'string' },
            role: { type: 'string', enum: ['Member', 'Staff'] },
            registration_date: { type: 'string', format: 'date-time' },
            borrowed_item_ids: { type: 'array', items: { type: 'string' } },
            loan_history_ids: { type: 'array', items: { type: 'string' } },
            borrowing_limit: { type: 'integer' },
            phone: { type: 'string', nullable: true },
            fines_owed: { type: 'number', nullable: true },
            membership_expiry: { type: 'string', format: 'date-time', nullable: true },
            membership_active: { type: 'boolean', description: 'Members only' },
            staff_role: { type: 'string', enum: ['Manager', 'Librarian'], nullable: true },
            hire_date: { type: 'string', format: 'date-time', nullable: true },
            permissions: { type: 'array', items: { type: 'string' }, description: 'Staff only' },
            years_of_service: { type: 'number', description: 'Staff only' },
          },
        },
        Loan: {
          type: 'object',
          properties: {
            loan_id: { type: 'string' },
            user_id: { type: 'string' },
            item_id: { type: 'string' },
            loan_period_days: { type: 'integer' },
            date_borrowed: { type: 'string', format: 'date-time' },
            date_due: { type: 'string', format: 'date-time' },
            date_returned: { type: 'string', format: 'date-time', nullable: true },
            is_returned: { type: 'boolean' },
            fine_amount: { type: 'number', description: 'Frozen at return time' },
            renewal_count: { type: 'integer' },
            max_renewals: { type: 'integer' },
            status: { type: 'string', enum: ['ACTIVE', 'OVERDUE', 'RETURNED'] },
            status_label: { type: 'string' },
            is_overdue: { type: 'boolean' },
            days_overdue: { type: 'integer' },
            current_fine: { type: 'number' },
            can_renew: { type: 'boolean' },
            loan_duration_days: { type: 'integer' },
          },
        },
        Error: {
          type: 'object',
          properties: {
            error: {
              type: 'object',
              properties: {
                code: { type: 'string', description: 'Error code' },
                message: { type: 'string', description: 'Human-readable error message' },
                details: { type: 'object', description: 'Additional error details' },
              },
            },
          },
        },
      },
    },
  },
  apis: ['./src/routes/**/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);
