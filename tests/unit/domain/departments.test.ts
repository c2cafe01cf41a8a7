/**
 * @fileoverview Unit tests for department and role specifications
 */

import {
  DirectorBoard,
  AccountingDepartment,
  FinancialDepartment,
  ITDepartment,
  FacilitiesDepartment,
  CustomerExperienceDepartment,
  DepartmentSpecification,
  RoleSpecification,
  Trainee,
  Candidate,
  MissingFieldError,
  MalformedValueError,
} from '../../../src';

describe('Department specifications', () => {
  it.each([
    [new DirectorBoard(), 'Diretoria'],
    [new AccountingDepartment(), 'Contabilidade'],
    [new FinancialDepartment(), 'Financeiro'],
    [new ITDepartment(), 'Tecnologia'],
    [new FacilitiesDepartment(), 'Serviços Gerais'],
    [new CustomerExperienceDepartment(), 'Relacionamento com o Cliente'],
  ])('%s should match area "%s"', (specification, area) => {
    expect(specification.isSatisfiedBy({ area })).toBe(true);
    expect(specification.isSatisfiedBy({ area: area.toUpperCase() })).toBe(true);
    expect(specification.isSatisfiedBy({ area: 'Marketing' })).toBe(false);
  });

  it('should require an exact match', () => {
    const itDepartment = new ITDepartment();

    expect(itDepartment.isSatisfiedBy({ area: 'Tecnologia da Informação' })).toBe(false);
    expect(itDepartment.isSatisfiedBy({ area: ' tecnologia' })).toBe(false);
  });

  it('should accept a Candidate accessor', () => {
    expect(new ITDepartment().isSatisfiedBy(Candidate.from({ area: 'tecnologia' }))).toBe(true);
  });

  it('should match arbitrary department names', () => {
    const marketing = new DepartmentSpecification('Marketing');

    expect(marketing.isSatisfiedBy({ area: 'MARKETING' })).toBe(true);
    expect(String(marketing)).toBe('DepartmentSpecification(area="Marketing")');
  });

  it('should render named departments without parameters', () => {
    expect(String(new ITDepartment())).toBe('ITDepartment()');
  });

  it('should fail on a missing or non-string area', () => {
    expect(() => new ITDepartment().isSatisfiedBy({ cargo: 'Analista' })).toThrowErrorType(MissingFieldError);
    expect(() => new ITDepartment().isSatisfiedBy({ area: 7 })).toThrowErrorType(MalformedValueError);
  });
});

describe('Role specifications', () => {
  it('should match trainees case-insensitively', () => {
    const trainee = new Trainee();

    expect(trainee.isSatisfiedBy({ cargo: 'Estagiario' })).toBe(true);
    expect(trainee.isSatisfiedBy({ cargo: 'ESTAGIARIO' })).toBe(true);
    expect(trainee.isSatisfiedBy({ cargo: 'Analista' })).toBe(false);
    expect(String(trainee)).toBe('Trainee()');
  });

  it('should match arbitrary roles', () => {
    const manager = new RoleSpecification('Gerente');

    expect(manager.isSatisfiedBy({ cargo: 'gerente' })).toBe(true);
    expect(String(manager)).toBe('RoleSpecification(cargo="Gerente")');
  });

  it('should fail on a missing cargo', () => {
    expect(() => new Trainee().isSatisfiedBy({ area: 'Tecnologia' })).toThrow('Candidate field "cargo" is missing');
  });
});
