import type { Host } from "./host.js";
import type { BuildErrorCode } from "./errors.js";

export const REQUIRED_TOOLS = [
  "git",
  "makepkg",
  "pacman",
  "repo-add",
  "meson",
  "ninja",
  "autoconf",
  "automake",
  "pkgconf",
  "sed",
  "sudo",
];

export interface DiagnosticIssue {
  severity: "error" | "warning";
  code?: BuildErrorCode;
  message: string;
  fix?: string;
}

export interface DoctorResult {
  issues: DiagnosticIssue[];
  toolsChecked: number;
  healthy: boolean;
}

export interface DoctorOptions {
  tools?: string[];
  user?: string;
  uid?: number;
}

export async function runDoctor(host: Host, options: DoctorOptions = {}): Promise<DoctorResult> {
  const tools = options.tools ?? REQUIRED_TOOLS;
  const user = options.user ?? process.env["USER"] ?? "builder";
  const uid = options.uid ?? process.getuid?.();
  const issues: DiagnosticIssue[] = [];

  for (const tool of tools) {
    if (!(await host.hasCommand(tool))) {
      issues.push({
        severity: "error",
        code: "ToolMissing",
        message: `${tool} is not installed`,
        fix: `Install ${tool} in the build chroot`,
      });
    }
  }

  if (uid === 0) {
    issues.push({
      severity: "error",
      code: "PrivilegeMissing",
      message: "Running as root; makepkg refuses to build as root",
      fix: "Run as an unprivileged user (e.g. builder) with passwordless sudo for pacman",
    });
  } else if (!(await host.canElevate())) {
    issues.push({
      severity: "error",
      code: "PrivilegeMissing",
      message: `User ${user} requires sudo access without password for pacman`,
      fix: `Add to /etc/sudoers: ${user} ALL=(ALL) NOPASSWD: /usr/bin/pacman`,
    });
  }

  return {
    issues,
    toolsChecked: tools.length,
    healthy: issues.filter((i) => i.severity === "error").length === 0,
  };
}
