/**
 * Eligibility - Department and Role Specifications
 *
 * Case-insensitive exact matches on the `area` and `cargo` fields.
 */

import { Candidate, EmployeeField, type CandidateLike } from '../candidate';
import { SpecificationBase } from '../specification';

/**
 * Known department names, lower-cased
 */
export const Department = {
  DIRECTOR_BOARD: 'diretoria',
  ACCOUNTING: 'contabilidade',
  FINANCIAL: 'financeiro',
  IT: 'tecnologia',
  FACILITIES: 'serviços gerais',
  CUSTOMER_EXPERIENCE: 'relacionamento com o cliente',
} as const;

/**
 * Known role names, lower-cased
 */
export const Role = {
  TRAINEE: 'estagiario',
} as const;

/**
 * Satisfied when a string field equals `expected`, ignoring case.
 *
 * @throws MissingFieldError when the field is absent
 * @throws MalformedValueError when the field is not a string
 */
export class FieldEqualsSpecification extends SpecificationBase<CandidateLike> {
  private readonly normalized: string;

  constructor(
    readonly field: string,
    readonly expected: string,
  ) {
    super();
    this.normalized = expected.toLowerCase();
  }

  isSatisfiedBy(candidate: CandidateLike): boolean {
    return Candidate.from(candidate).getString(this.field).toLowerCase() === this.normalized;
  }

  protected describeParameters(): string {
    return `${this.field}="${this.expected}"`;
  }
}

/**
 * Matches the `area` field against a department name.
 *
 * @example
 * ```typescript
 * const marketing = new DepartmentSpecification('Marketing');
 * marketing.isSatisfiedBy({ area: 'MARKETING' }); // true
 * ```
 */
export class DepartmentSpecification extends FieldEqualsSpecification {
  constructor(department: string) {
    super(EmployeeField.AREA, department);
  }

  // Named departments render as `ITDepartment()`
  protected describeParameters(): string {
    return this.constructor === DepartmentSpecification ? super.describeParameters() : '';
  }
}

export class DirectorBoard extends DepartmentSpecification {
  constructor() {
    super(Department.DIRECTOR_BOARD);
  }
}

export class AccountingDepartment extends DepartmentSpecification {
  constructor() {
    super(Department.ACCOUNTING);
  }
}

export class FinancialDepartment extends DepartmentSpecification {
  constructor() {
    super(Department.FINANCIAL);
  }
}

export class ITDepartment extends DepartmentSpecification {
  constructor() {
    super(Department.IT);
  }
}

export class FacilitiesDepartment extends DepartmentSpecification {
  constructor() {
    super(Department.FACILITIES);
  }
}

export class CustomerExperienceDepartment extends DepartmentSpecification {
  constructor() {
    super(Department.CUSTOMER_EXPERIENCE);
  }
}

/**
 * Matches the `cargo` field against a role name.
 */
export class RoleSpecification extends FieldEqualsSpecification {
  constructor(role: string) {
    super(EmployeeField.CARGO, role);
  }

  protected describeParameters(): string {
    return this.constructor === RoleSpecification ? super.describeParameters() : '';
  }
}

export class Trainee extends RoleSpecification {
  constructor() {
    super(Role.TRAINEE);
  }
}
