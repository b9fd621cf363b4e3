/*
 * SonarQube CLI
 * Copyright (C) 2026 SonarSource Sàrl
 * mailto:info AT sonarsource DOT com
 *
 * This program is free software; you can redistribute it and/or
 * modify it under the terms of the GNU Lesser General Public
 * License as published by the Free Software Foundation; either
 * version 3 of the License, or (at your option) any later version.
 *
 * This program is distributed in the hope that it will be useful,
 * but WITHOUT ANY WARRANTY; without even the implied warranty of
 * MERCHANTABILITY or FITNESS FOR A PARTICULAR PURPOSE.  See the GNU
 * Lesser General Public License for more details.
 *
 * You should have received a copy of the GNU Lesser General Public License
 * along with this program; if not, write to the Free Software Foundation,
 * Inc., 51 Franklin Street, Fifth Floor, Boston, MA  02110-1301, USA.
 */

// Test mock utilities for the UI module

export interface UiCall {
  method: string;
  args: unknown[];
}

let mockActive = false;
const calls: UiCall[] = [];

export function setMockUi(active: boolean): void {
  mockActive = active;
  if (!active) {
    calls.length = 0;
  }
}

export function isMockActive(): boolean {
  return mockActive;
}

export function recordCall(method: string, ...args: unknown[]): void {
  calls.push({ method, args });
}

export function getMockUiCalls(): UiCall[] {
  return [...calls];
}

/**
 * First argument of every recorded call to method, as strings.
 */
export function getMockUiMessages(method: string): string[] {
  return calls.filter((call) => call.method === method).map((call) => String(call.args[0]));
}

export function clearMockUiCalls(): void {
  calls.length = 0;
}
