import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import { Application } from 'express';
import { createApp } from '../src/app';
import { createLibraryContext } from '../src/context';
import { createInMemoryStores } from '../src/repositories/memory.repository';
import { advanceDays, freezeClock, sequentialIds } from './helpers/fixtures';

const book = {
  item_type: 'Book',
  item_id: 'B1',
  title: 'The Silent River',
  author: 'Ada Fenwick',
  isbn: '978-0000000001',
  pages: 320,
};

const dvd = {
  item_type: 'DVD',
  item_id: 'D1',
  title: 'Harbor Lights',
  duration: 135,
  genre: 'Drama',
  rating: 'PG-13',
};

const member = { user_id: 'U1', name: 'Alice Reader', email: 'alice@example.com' };
const staff = { user_id: 'S1', name: 'Sam Shelver', email: 'sam@example.com', staff_role: 'Manager' };

describe('Library Catalog API', () => {
  let app: Application;

  beforeEach(async () => {
    freezeClock();
    app = createApp(createLibraryContext({ stores: createInMemoryStores(), generateLoanId: sequentialIds() }));

    await request(app).post('/v1/items').send(book).expect(201);
    await request(app).post('/v1/items').send(dvd).expect(201);
    await request(app).post('/v1/users/members').send(member).expect(201);
    await request(app).post('/v1/users/staff').send(staff).expect(201);
  });

  describe('GET /health', () => {
    it('reports the storage driver', async () => {
      const res = await request(app).get('/health').expect(200);

      expect(res.body).toMatchObject({ status: 'healthy', storage: 'memory' });
    });
  });

  describe('GET /openapi.json', () => {
    it('documents the loan endpoints', async () => {
      const res = await request(app).get('/openapi.json').expect(200);

      expect(res.body.openapi).toBe('3.0.0');
      expect(Object.keys(res.body.paths)).toContain('/v1/loans/checkout');
    });
  });

  describe('items', () => {
    it('adds an item with its loan period', async () => {
      const res = await request(app)
        .post('/v1/items')
        .send({ item_type: 'Magazine', item_id: 'M1', title: 'Garden Monthly', issue_number: '42', publisher: 'Leaf Press' })
        .expect(201);

      expect(res.body.message).toBe('Magazine added to catalog');
      expect(res.body.persisted).toBe(true);
      expect(res.body.data).toMatchObject({
        item_id: 'M1',
        item_type: 'Magazine',
        is_available: true,
        loan_period_days: 7,
        publication_date: '2025-03-01T09:00:00.000Z',
      });
    });

    it('rejects a duplicate item id', async () => {
      const res = await request(app).post('/v1/items').send(book).expect(409);

      expect(res.body.error).toEqual({
        code: 'DUPLICATE_IDENTIFIER',
        message: 'Item with ID B1 already exists',
      });
    });

    it('rejects a book without an author', async () => {
      const res = await request(app)
        .post('/v1/items')
        .send({ item_type: 'Book', item_id: 'B2', title: 'Untitled', isbn: '1' })
        .expect(400);

      expect(res.body.error.code).toBe('VALIDATION_ERROR');
      expect(res.body.error.details.errors).toEqual([{ field: 'body.author', message: 'Required' }]);
    });

    it('filters by type and availability', async () => {
      await request(app).post('/v1/loans/checkout').send({ user_id: 'U1', item_id: 'D1' }).expect(201);

      const res = await request(app).get('/v1/items').query({ available: 'true' }).expect(200);
      expect(res.body.data.map((item: { item_id: string }) => item.item_id)).toEqual(['B1']);

      const dvds = await request(app).get('/v1/items').query({ type: 'DVD' }).expect(200);
      expect(dvds.body.data.map((item: { item_id: string }) => item.item_id)).toEqual(['D1']);
    });

    it('returns 404 for an unknown item', async () => {
      const res = await request(app).get('/v1/items/NOPE').expect(404);

      expect(res.body.error).toEqual({ code: 'ITEM_NOT_FOUND', message: 'Item with ID NOPE not found' });
    });

    it('refuses to remove an item on loan, then removes it after check-in', async () => {
      await request(app).post('/v1/loans/checkout').send({ user_id: 'U1', item_id: 'B1' }).expect(201);

      const refused = await request(app).delete('/v1/items/B1').expect(409);
      expect(refused.body.error.code).toBe('ITEM_ON_LOAN');

      await request(app).post('/v1/loans/checkin').send({ user_id: 'U1', item_id: 'B1' }).expect(200);
      await request(app).delete('/v1/items/B1').expect(200);
      await request(app).get('/v1/items/B1').expect(404);
    });

    it('ranks popular items', async () => {
      await request(app).post('/v1/loans/checkout').send({ user_id: 'U1', item_id: 'D1' }).expect(201);
      await request(app).post('/v1/loans/checkin').send({ user_id: 'U1', item_id: 'D1' }).expect(200);
      await request(app).post('/v1/loans/checkout').send({ user_id: 'S1', item_id: 'D1' }).expect(201);
      await request(app).post('/v1/loans/checkout').send({ user_id: 'U1', item_id: 'B1' }).expect(201);

      const res = await request(app).get('/v1/items/popular').query({ limit: 1 }).expect(200);

      expect(res.body.data).toHaveLength(1);
      expect(res.body.data[0]).toMatchObject({ item: { item_id: 'D1' }, loan_count: 2 });
    });
  });

  describe('users', () => {
    it('registers a member with a one-year membership', async () => {
      const res = await request(app).get('/v1/users/U1').expect(200);

      expect(res.body.data).toMatchObject({
        user_id: 'U1',
        role: 'Member',
        borrowing_limit: 5,
        fines_owed: 0,
        membership_expiry: '2026-03-01T09:00:00.000Z',
        membership_active: true,
      });
    });

    it('registers staff with role permissions', async () => {
      const res = await request(app).get('/v1/users/S1').expect(200);

      expect(res.body.data).toMatchObject({ role: 'Staff', staff_role: 'Manager', borrowing_limit: 20 });
      expect(res.body.data.permissions).toContain('system_admin');
    });

    it('rejects a malformed email', async () => {
      const res = await request(app)
        .post('/v1/users/members')
        .send({ user_id: 'U2', name: 'Bad Mail', email: 'not-an-email' })
        .expect(400);

      expect(res.body.error.code).toBe('VALIDATION_ERROR');
      expect(res.body.error.message).toBe('Invalid member: email: Invalid email format');
    });

    it('lists users by role', async () => {
      const res = await request(app).get('/v1/users').query({ role: 'Staff' }).expect(200);

      expect(res.body.data.map((user: { user_id: string }) => user.user_id)).toEqual(['S1']);
    });

    it('changes a staff role', async () => {
      const res = await request(app).patch('/v1/users/S1/staff-role').send({ staff_role: 'Librarian' }).expect(200);

      expect(res.body.message).toBe('Role changed to Librarian');
      expect(res.body.data.borrowing_limit).toBe(15);
    });

    it('extends a membership', async () => {
      const res = await request(app).post('/v1/users/U1/membership/extend').send({ days: 30 }).expect(200);

      expect(res.body.message).toBe('Membership extended until 2026-03-31');
    });

    it('refuses to remove a user with active loans', async () => {
      await request(app).post('/v1/loans/checkout').send({ user_id: 'U1', item_id: 'B1' }).expect(201);

      const res = await request(app).delete('/v1/users/U1').expect(409);
      expect(res.body.error.code).toBe('HAS_ACTIVE_LOANS');
    });
  });

  describe('circulation', () => {
    it('checks out a book due in 21 days', async () => {
      const res = await request(app).post('/v1/loans/checkout').send({ user_id: 'U1', item_id: 'B1' }).expect(201);

      expect(res.body.message).toBe('Item checked out successfully. Due date: 2025-03-22');
      expect(res.body.data).toMatchObject({
        loan_id: 'loan-1',
        user_id: 'U1',
        item_id: 'B1',
        date_due: '2025-03-22T09:00:00.000Z',
        status: 'ACTIVE',
        renewal_count: 0,
        can_renew: true,
      });

      const item = await request(app).get('/v1/items/B1').expect(200);
      expect(item.body.data.is_available).toBe(false);
    });

    it('matches padded identifiers to the trimmed records', async () => {
      await request(app)
        .post('/v1/users/members')
        .send({ user_id: ' U2 ', name: 'Bram Page', email: 'bram@example.com' })
        .expect(201);

      const res = await request(app).post('/v1/loans/checkout').send({ user_id: ' U2 ', item_id: ' B1 ' }).expect(201);

      expect(res.body.data).toMatchObject({ user_id: 'U2', item_id: 'B1' });
    });

    it('refuses to lend an item that is already out', async () => {
      await request(app).post('/v1/loans/checkout').send({ user_id: 'U1', item_id: 'B1' }).expect(201);

      const res = await request(app).post('/v1/loans/checkout').send({ user_id: 'S1', item_id: 'B1' }).expect(409);

      expect(res.body.error.code).toBe('ITEM_UNAVAILABLE');
      expect(res.body.error.message).toBe('Item is not available');
    });

    it('charges 2.50 for a book returned 5 days late', async () => {
      await request(app).post('/v1/loans/checkout').send({ user_id: 'U1', item_id: 'B1' }).expect(201);
      advanceDays(26);

      const overdue = await request(app).get('/v1/loans/overdue').expect(200);
      expect(overdue.body.data).toHaveLength(1);
      expect(overdue.body.data[0]).toMatchObject({ days_overdue: 5, current_fine: 2.5, status: 'OVERDUE' });

      const res = await request(app).post('/v1/loans/checkin').send({ user_id: 'U1', item_id: 'B1' }).expect(200);

      expect(res.body.message).toBe('Item returned successfully. Fine owed: $2.50');
      expect(res.body.data).toMatchObject({
        fine: 2.5,
        fine_charged: true,
        loan: { status: 'RETURNED', status_label: 'Returned Late (Fine: $2.50)', fine_amount: 2.5 },
      });

      const user = await request(app).get('/v1/users/U1').expect(200);
      expect(user.body.data.fines_owed).toBe(2.5);
    });

    it('denies renewal of an overdue loan', async () => {
      await request(app).post('/v1/loans/checkout').send({ user_id: 'U1', item_id: 'D1' }).expect(201);
      advanceDays(15);

      const res = await request(app).post('/v1/loans/renew').send({ user_id: 'U1', item_id: 'D1' }).expect(409);

      expect(res.body.error).toEqual({
        code: 'RENEWAL_DENIED',
        message: 'Cannot renew loan: item is overdue',
        details: { userId: 'U1', itemId: 'D1', denial: 'OVERDUE' },
      });
    });

    it('renews twice and denies the third renewal', async () => {
      await request(app).post('/v1/loans/checkout').send({ user_id: 'U1', item_id: 'B1' }).expect(201);

      const first = await request(app).post('/v1/loans/renew').send({ user_id: 'U1', item_id: 'B1' }).expect(200);
      expect(first.body.message).toBe('Loan renewed successfully. New due date: 2025-04-12');
      await request(app).post('/v1/loans/renew').send({ user_id: 'U1', item_id: 'B1' }).expect(200);

      const third = await request(app).post('/v1/loans/renew').send({ user_id: 'U1', item_id: 'B1' }).expect(409);
      expect(third.body.error.message).toBe('Cannot renew loan: maximum renewals reached');

      const loan = await request(app).get('/v1/loans/loan-1').expect(200);
      expect(loan.body.data.renewal_count).toBe(2);
    });

    it('blocks a member over the fine threshold until the fine is paid', async () => {
      await request(app).post('/v1/loans/checkout').send({ user_id: 'U1', item_id: 'B1' }).expect(201);
      advanceDays(42);
      await request(app).post('/v1/loans/checkin').send({ user_id: 'U1', item_id: 'B1' }).expect(200);

      const blocked = await request(app).post('/v1/loans/checkout').send({ user_id: 'U1', item_id: 'D1' }).expect(409);
      expect(blocked.body.error).toEqual({
        code: 'BORROWING_NOT_ALLOWED',
        message: 'User cannot borrow this item (check limits, fines, or membership status)',
        details: { userId: 'U1', itemId: 'D1' },
      });

      const paid = await request(app).post('/v1/users/U1/fines/payments').send({ amount: 20 }).expect(200);
      expect(paid.body.message).toBe('Payment of $10.50 applied. Remaining balance: $0.00');
      expect(paid.body.data.amount_applied).toBe(10.5);

      await request(app).post('/v1/loans/checkout').send({ user_id: 'U1', item_id: 'D1' }).expect(201);
    });

    it('does not charge staff for a late return', async () => {
      await request(app).post('/v1/loans/checkout').send({ user_id: 'S1', item_id: 'D1' }).expect(201);
      advanceDays(16);

      const res = await request(app).post('/v1/loans/checkin').send({ user_id: 'S1', item_id: 'D1' }).expect(200);

      expect(res.body.data).toMatchObject({ fine: 1, fine_charged: false });
    });

    it('validates the request body', async () => {
      const res = await request(app).post('/v1/loans/checkout').send({ user_id: 'U1' }).expect(400);

      expect(res.body.error).toEqual({
        code: 'VALIDATION_ERROR',
        message: 'Validation failed',
        details: { errors: [{ field: 'body.item_id', message: 'Required' }] },
      });
    });

    it('returns 404 when there is no loan to return', async () => {
      const res = await request(app).post('/v1/loans/checkin').send({ user_id: 'U1', item_id: 'B1' }).expect(404);

      expect(res.body.error.message).toBe('No active loan found for this item and user');
    });

    it('lists a user history including returned loans', async () => {
      await request(app).post('/v1/loans/checkout').send({ user_id: 'U1', item_id: 'B1' }).expect(201);
      await request(app).post('/v1/loans/checkin').send({ user_id: 'U1', item_id: 'B1' }).expect(200);

      const active = await request(app).get('/v1/users/U1/loans').expect(200);
      expect(active.body.data).toEqual([]);

      const all = await request(app).get('/v1/users/U1/loans').query({ active: 'false' }).expect(200);
      expect(all.body.data.map((loan: { loan_id: string }) => loan.loan_id)).toEqual(['loan-1']);
    });
  });

  describe('maintenance', () => {
    it('reports statistics', async () => {
      await request(app).post('/v1/loans/checkout').send({ user_id: 'U1', item_id: 'D1' }).expect(201);
      advanceDays(20);

      const res = await request(app).get('/v1/maintenance/statistics').expect(200);

      expect(res.body.data).toMatchObject({
        total_items: 2,
        available_items: 1,
        books_count: 1,
        dvds_count: 1,
        total_members: 1,
        total_staff: 1,
        active_loans: 1,
        overdue_loans: 1,
        accruing_overdue_fines: 3,
        uptime_days: 20,
      });
    });

    it('reports a clean integrity scan', async () => {
      const res = await request(app).get('/v1/maintenance/integrity').expect(200);

      expect(res.body).toEqual({
        data: { valid: true, violations: [] },
        message: 'No integrity violations found',
      });
    });

    it('rejects a negative fine rate', async () => {
      const res = await request(app).put('/v1/maintenance/fine-rate').send({ daily_fine_rate: -1 }).expect(400);

      expect(res.body.error.details.errors).toEqual([
        { field: 'body.daily_fine_rate', message: 'Daily fine rate cannot be negative' },
      ]);
    });

    it('applies a new fine rate to later returns', async () => {
      await request(app).put('/v1/maintenance/fine-rate').send({ daily_fine_rate: 1 }).expect(200);
      await request(app).post('/v1/loans/checkout').send({ user_id: 'U1', item_id: 'D1' }).expect(201);
      advanceDays(17);

      const res = await request(app).post('/v1/loans/checkin').send({ user_id: 'U1', item_id: 'D1' }).expect(200);

      expect(res.body.data.fine).toBe(3);
    });
  });

  it('returns 404 for unknown routes', async () => {
    const res = await request(app).get('/v1/nothing').expect(404);

    expect(res.body.error).toEqual({ code: 'NOT_FOUND', message: 'Route GET /v1/nothing not found' });
  });
});
