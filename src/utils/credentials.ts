// Email and password rules shared by registration, login and the User model.

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;
export const MIN_PASSWORD_LENGTH = 8;

// Trims and lowercases an email address.
export function normalizeEmail(email: string): string {
    return email.trim().toLowerCase();
}

export function isValidEmail(email: string): boolean {
    return email.length <= 255 && EMAIL_PATTERN.test(email);
}

// Returns the first rule the password breaks, or null when it is acceptable.
export function passwordPolicyViolation(password: string): string | null {
    if (password.length < MIN_PASSWORD_LENGTH) {
        return `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`;
    }
    if (/\s/.test(password)) {
        return "Password must not contain whitespace";
    }
    if (!/[A-Z]/.test(password)) {
        return "Password must contain an uppercase letter";
    }
    if (!/[a-z]/.test(password)) {
        return "Password must contain a lowercase letter";
    }
    if (!/[0-9]/.test(password)) {
        return "Password must contain a digit";
    }
    return null;
}
