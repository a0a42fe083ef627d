import { Item } from '../models/item.model';
import { Loan } from '../models/loan.model';
import { User } from '../models/user.model';
import { itemRowMapper, loanRowMapper, userRowMapper } from '../repositories/row-mappers';
import { LibraryStatistics, MemberActivity, PopularCatalogItem } from '../types/directory.types';

/**
 * Response bodies share the snake_case field names of the persisted rows,
 * plus derived values the rows do not store
 */

export const serializeItem = (item: Item) => ({
  ...itemRowMapper.toRow(item),
  loan_period_days: item.loanPeriodDays(),
});

export const serializeUser = (user: User) => {
  const base = {
    ...userRowMapper.toRow(user),
    borrowing_limit: user.borrowingLimit(),
  };

  return user.kind === 'Member'
    ? { ...base, membership_active: user.isMembershipActive() }
    : { ...base, permissions: user.permissions, years_of_service: user.yearsOfService() };
};

export const serializeLoan = (loan: Loan) => ({
  ...loanRowMapper.toRow(loan),
  max_renewals: loan.maxRenewals,
  status: loan.status(),
  status_label: loan.statusLabel(),
  is_overdue: loan.isOverdue(),
  days_overdue: loan.daysOverdue(),
  current_fine: loan.currentFine(),
  can_renew: loan.canRenew(),
  loan_duration_days: loan.loanDurationDays(),
});

export const serializePopularItem = ({ item, loanCount }: PopularCatalogItem) => ({
  item: serializeItem(item),
  loan_count: loanCount,
});

export const serializeActivity = (activity: MemberActivity) => ({
  user_id: activity.userId,
  user_name: activity.userName,
  user_role: activity.userRole,
  total_loans: activity.totalLoans,
  active_loans: activity.activeLoans,
  overdue_loans: activity.overdueLoans,
  fines_owed: activity.finesOwed,
  borrowing_limit: activity.borrowingLimit,
  recent_loans: activity.recentLoans.map(serializeLoan),
});

export const serializeStatistics = (stats: LibraryStatistics) => ({
  library_name: stats.libraryName,
  total_items: stats.totalItems,
  available_items: stats.availableItems,
  books_count: stats.itemsByType.Book,
  magazines_count: stats.itemsByType.Magazine,
  dvds_count: stats.itemsByType.DVD,
  total_users: stats.totalUsers,
  total_members: stats.totalMembers,
  total_staff: stats.totalStaff,
  total_loans: stats.totalLoans,
  active_loans: stats.activeLoans,
  overdue_loans: stats.overdueLoans,
  accruing_overdue_fines: stats.accruingOverdueFines,
  outstanding_member_fines: stats.outstandingMemberFines,
  uptime_days: stats.uptimeDays,
});
