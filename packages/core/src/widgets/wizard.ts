/**
 * packages/core/src/widgets/wizard.ts: Multi-step forms.
 *
 * A WizardForm holds WizardStep children and shows one of them at a time.
 * The current step index round-trips through the hidden `<form id>_step`
 * field. Navigation between steps is a composite widget of the form; the
 * default navigation offers one button per reachable step.
 */

import { FormworkError } from "../errors.js";
import { escapeHtml } from "../html/escape.js";
import { HtmlTag } from "../html/tag.js";
import type { HtmlWriter } from "../html/writer.js";
import { ofType } from "../ui/uiObject.js";
import { Button } from "./button.js";
import { Container } from "./container.js";
import { Form } from "./form.js";
import { Widget } from "./widget.js";

export class WizardStep extends Container {
  override readonly kind: string = "wizardStep";

  title: string | null;

  constructor(id: string | null = null, title: string | null = null) {
    super(id);
    this.title = title;
  }
}

export abstract class WizardNavigation extends Widget {
  /** Index of the step the user asked for, or null to stay. */
  abstract getNextStep(): number | null;

  /**
   * @throws FormworkError FW_CONSTRUCTION when the parent is not a WizardForm
   */
  protected getWizardForm(): WizardForm {
    if (!(this.parent instanceof WizardForm)) {
      throw new FormworkError(
        "FW_CONSTRUCTION",
        `${this.kind} must be a child of a WizardForm.`,
      );
    }
    return this.parent;
  }
}

const NAVIGATION_KEY = "navigation";

export class WizardForm extends Form {
  override readonly kind: string = "wizardForm";

  /** Index of the current step. */
  step = 0;

  addStep(step: WizardStep): void {
    this.add(step);
  }

  getSteps(): readonly WizardStep[] {
    return this.getChildren(ofType(WizardStep));
  }

  getStepCount(): number {
    return this.getSteps().length;
  }

  getStep(index: number): WizardStep | null {
    return this.getSteps()[index] ?? null;
  }

  getStepTitle(index: number): string {
    return this.getStep(index)?.title ?? "";
  }

  getNavigation(): WizardNavigation {
    return this.getCompositeWidget(NAVIGATION_KEY, ofType(WizardNavigation));
  }

  /** Name of the hidden field that carries the current step. */
  getStepFieldName(): string {
    return `${this.id ?? ""}_step`;
  }

  /**
   * Restore the step from the submission, process it and the navigation, then
   * move to the step the navigation chose. Moving forward is refused while
   * the current step has messages.
   */
  override process(): void {
    if (!this.isInitialized()) this.init();
    if (!this.isSubmitted()) {
      this.markProcessed();
      return;
    }

    this.restoreStep();
    super.process();

    const next = this.getNavigation().getNextStep();
    if (next === null) return;
    if (next > this.step && this.getStep(this.step)?.hasMessage() === true) return;
    this.step = next;
  }

  /** Navigation used by this form. Subclasses may return their own. */
  protected createNavigation(): WizardNavigation {
    return new WizardNavigationSteps();
  }

  protected override createCompositeWidgets(): void {
    this.addCompositeWidget(this.createNavigation(), NAVIGATION_KEY);
  }

  protected override processChildren(): void {
    const current = this.getStep(this.step);
    if (current !== null && !current.isProcessed()) current.process();
  }

  protected override displayFormContent(out: HtmlWriter): void {
    this.getNavigation().display(out);
    this.getStep(this.step)?.display(out);
  }

  protected override displayHiddenFields(out: HtmlWriter): void {
    this.addHiddenField(this.getStepFieldName(), String(this.step));
    super.displayHiddenFields(out);
  }

  protected override getCSSClassNames(): readonly string[] {
    return ["formwork-wizard-form", ...super.getCSSClassNames()];
  }

  private restoreStep(): void {
    const raw = this.getValue(this.getStepFieldName());
    const text = typeof raw === "string" ? raw : raw?.[0];
    if (text === undefined || !/^\d+$/.test(text)) return;
    const index = Number(text);
    if (index < this.getStepCount()) this.step = index;
  }
}

/**
 * One button per step. The current step shows as plain text; earlier steps
 * and the next step are buttons.
 */
export class WizardNavigationSteps extends WizardNavigation {
  readonly kind: string = "wizardNavigationSteps";

  getNextStep(): number | null {
    const buttons = this.getStepButtons();
    for (let i = 0; i < buttons.length; i++) {
      if (buttons[i]?.hasBeenClicked() === true) return i;
    }
    return null;
  }

  override display(out: HtmlWriter): void {
    if (!this.visible) return;
    const form = this.getWizardForm();
    super.display(out);

    const buttons = this.getStepButtons();
    const div = new HtmlTag("div", { style: "float:right;" });
    div.open(out);
    for (let i = 0; i < form.getStepCount(); i++) {
      if (i === form.step) {
        out.write(`${escapeHtml(form.getStepTitle(i))}<br />`);
      } else if (i < form.step || i === form.step + 1) {
        buttons[i]?.display(out);
        out.write("<br />");
      }
    }
    div.close(out);
  }

  protected override createCompositeWidgets(): void {
    const form = this.getWizardForm();
    for (let i = 0; i < form.getStepCount(); i++) {
      this.addStepButton(form, i);
    }
  }

  /**
   * One button per step. Steps added after the composites were created get
   * their button here, brought up to the lifecycle stage of the navigation.
   */
  private getStepButtons(): readonly Button[] {
    const form = this.getWizardForm();
    const buttons = [...this.getCompositeWidgets(ofType(Button)).values()];
    for (let i = buttons.length; i < form.getStepCount(); i++) {
      const button = this.addStepButton(form, i);
      if (this.isProcessed()) {
        button.process();
      } else if (this.isInitialized()) {
        button.init();
      }
      buttons.push(button);
    }
    return buttons;
  }

  private addStepButton(form: WizardForm, index: number): Button {
    const button = new Button(`${form.id ?? "wizard"}_nav_step${index}`);
    button.title = form.getStepTitle(index);
    this.addCompositeWidget(button, `step${index}`);
    return button;
  }
}
