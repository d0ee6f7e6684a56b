// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

export class UnsupportedDialectError extends Error {
  readonly dialect: string | undefined;

  constructor(message: string, dialect?: string) {
    super(message);
    this.name = "UnsupportedDialectError";
    this.dialect = dialect;
  }
}

export class UnitOfWorkError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnitOfWorkError";
  }
}
