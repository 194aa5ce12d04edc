import type { UserRole } from "@/clinic/types";
import { ForbiddenError } from "@/clinic/errors";

export function canManageAppointments(role: UserRole): boolean {
  switch (role) {
    case "RECEPTIONIST":
    case "CLINICIAN":
    case "ADMIN":
      return true;
    case "PATIENT":
      return false;
  }
}

export function assertCanManageAppointments(role: UserRole): void {
  if (!canManageAppointments(role)) {
    throw new ForbiddenError(`Role ${role} may not manage appointments`);
  }
}
