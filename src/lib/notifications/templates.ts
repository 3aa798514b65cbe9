import type { Appointment, Patient } from "@/types";

export interface EmailContent {
  subject: string;
  body: string;
}

const SIGN_OFF = "Thank you,\nMedical Office Staff";

export function confirmLink(publicUrl: string, appointmentId: string): string {
  return `${publicUrl}/confirm?appointment_id=${encodeURIComponent(appointmentId)}&action=confirm`;
}

export function cancelLink(publicUrl: string, appointmentId: string): string {
  return `${publicUrl}/confirm?appointment_id=${encodeURIComponent(appointmentId)}&action=cancel`;
}

function when(appointment: Appointment): string {
  return `${appointment.date} at ${appointment.startTime}`;
}

export function confirmationEmail(
  patient: Patient,
  appointment: Appointment,
  publicUrl: string,
): EmailContent {
  const lines = [
    `Dear ${patient.name},`,
    "",
    `Your appointment with ${appointment.doctorId} is booked for ${when(appointment)} (${appointment.durationMinutes} minutes).`,
    `Appointment ID: ${appointment.id}`,
    "",
  ];
  if (!appointment.insuranceVerified) {
    lines.push(
      "We could not verify your insurance yet. Please bring your insurance card to the visit.",
      "",
    );
  }
  lines.push(
    `Cancel: ${cancelLink(publicUrl, appointment.id)}`,
    "",
    SIGN_OFF,
  );
  return {
    subject: `Appointment Confirmation with ${appointment.doctorId}`,
    body: lines.join("\n"),
  };
}

export function intakeFormEmail(patient: Patient, appointment: Appointment): EmailContent {
  return {
    subject: "Please Complete Your Patient Intake Form",
    body: [
      `Dear ${patient.name},`,
      "",
      `Ahead of your appointment with ${appointment.doctorId} on ${when(appointment)}, please complete the attached intake form and bring it with you.`,
      "",
      SIGN_OFF,
    ].join("\n"),
  };
}

/**
 * Reminder wording by escalation level:
 * 0 friendly, 1 forms plus confirm/cancel links, 2 final and urgent.
 */
export function reminderEmail(
  level: number,
  patient: Patient,
  appointment: Appointment,
  publicUrl: string,
): EmailContent {
  const greeting = `Dear ${patient.name},`;
  const links = [
    `Confirm: ${confirmLink(publicUrl, appointment.id)}`,
    `Cancel: ${cancelLink(publicUrl, appointment.id)}`,
  ];

  if (level <= 0) {
    return {
      subject: `Reminder: Upcoming Appointment with ${appointment.doctorId}`,
      body: [
        greeting,
        "",
        `This is a friendly reminder about your appointment with ${appointment.doctorId} on ${when(appointment)}.`,
        "Please arrive 15 minutes early.",
        "",
        SIGN_OFF,
      ].join("\n"),
    };
  }

  if (level === 1) {
    return {
      subject: `Action Required: Complete Forms & Confirm Appointment with ${appointment.doctorId}`,
      body: [
        greeting,
        "",
        `Your appointment with ${appointment.doctorId} on ${when(appointment)} is approaching.`,
        appointment.formsCompleted
          ? "Thank you for completing your intake form."
          : "Please complete the intake form we sent you if you haven't already.",
        "",
        ...links,
        "",
        SIGN_OFF,
      ].join("\n"),
    };
  }

  return {
    subject: `Final Reminder: Appointment with ${appointment.doctorId} - Please Confirm`,
    body: [
      greeting,
      "",
      `FINAL REMINDER: your appointment with ${appointment.doctorId} is on ${when(appointment)}.`,
      "We have not heard back from you. Please confirm or cancel now so we can offer the time to another patient.",
      "",
      ...links,
      "",
      SIGN_OFF,
    ].join("\n"),
  };
}
