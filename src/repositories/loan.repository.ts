import { SupabaseClient } from '@supabase/supabase-js';
import { Loan } from '../models/loan.model';
import { LoanRow } from '../types/loan.types';
import { SupabaseRepository } from './supabase.repository';
import { loanRowMapper } from './row-mappers';

export class LoanRepository extends SupabaseRepository<Loan, LoanRow> {
  constructor(client: SupabaseClient) {
    super(client, { table: 'loans', idColumn: 'loan_id' }, loanRowMapper);
  }
}
