import type {
  AdminDemotionNotificationPayload,
  AdminOtpNotificationPayload,
  AdminPromotionNotificationPayload
} from "@admin-access/shared-types";

export type EmailContent = {
  subject: string;
  text: string;
  html: string;
};

const PRODUCT_NAME = "Founder Platform Admin";

function formatLabel(value: string) {
  return value
    .split("_")
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}

function wrapHtml(body: string) {
  return `
    <div style="font-family: Arial, sans-serif; color: #172033; line-height: 1.5;">
      <h2 style="margin: 0 0 12px;">${PRODUCT_NAME}</h2>
      ${body}
    </div>
  `;
}

export function renderOtpEmail(payload: AdminOtpNotificationPayload): EmailContent {
  const name = payload.fullName || "Admin";
  return {
    subject: `${PRODUCT_NAME} login code`,
    text: [
      `Hi ${name},`,
      "",
      `Your admin login code is: ${payload.code}`,
      `This code expires in ${payload.expiresInMinutes} minutes.`,
      "",
      "If you did not request this, please ignore this email."
    ].join("\n"),
    html: wrapHtml(`
      <p>Hi ${name},</p>
      <p>Your admin login code is:</p>
      <p style="font-size: 28px; font-weight: 700; letter-spacing: 6px;">${payload.code}</p>
      <p>This code expires in ${payload.expiresInMinutes} minutes.</p>
      <p>If you did not request this, please ignore this email.</p>
    `)
  };
}

export function renderPromotionEmail(payload: AdminPromotionNotificationPayload): EmailContent {
  const role = formatLabel(payload.role);
  const permissions = payload.permissions.map(formatLabel);
  return {
    subject: `You've been promoted to ${role}`,
    text: [
      `Hi ${payload.fullName},`,
      "",
      `${payload.promotedBy} has given you the ${role} role.`,
      `Permissions: ${permissions.join(", ")}`,
      "",
      "Sign in to the admin dashboard with your email to receive a login code."
    ].join("\n"),
    html: wrapHtml(`
      <p>Hi ${payload.fullName},</p>
      <p><strong>${payload.promotedBy}</strong> has given you the <strong>${role}</strong> role.</p>
      <ul>${permissions.map((permission) => `<li>${permission}</li>`).join("")}</ul>
      <p>Sign in to the admin dashboard with your email to receive a login code.</p>
    `)
  };
}

export function renderDemotionEmail(payload: AdminDemotionNotificationPayload): EmailContent {
  return {
    subject: `${PRODUCT_NAME} access removed`,
    text: [
      `Hi ${payload.fullName},`,
      "",
      `Your admin access was removed by ${payload.demotedBy}.`,
      payload.reason ? `Reason: ${payload.reason}` : null
    ]
      .filter((line): line is string => line !== null)
      .join("\n"),
    html: wrapHtml(`
      <p>Hi ${payload.fullName},</p>
      <p>Your admin access was removed by <strong>${payload.demotedBy}</strong>.</p>
      ${payload.reason ? `<p><strong>Reason:</strong> ${payload.reason}</p>` : ""}
    `)
  };
}
