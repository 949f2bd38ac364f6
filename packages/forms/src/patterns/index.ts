export {
  ControlledGreetingForm,
  type ControlledGreetingFormProps,
  type GreetingValues,
} from "./ControlledGreetingForm";
export { ProfileForm, EMPTY_PROFILE, type ProfileFormProps, type ProfileValues } from "./ProfileForm";
export {
  ReducerSignupForm,
  EMPTY_SIGNUP,
  signupRules,
  type ReducerSignupFormProps,
  type SignupValues,
} from "./ReducerSignupForm";
export {
  UncontrolledContactForm,
  type ContactField,
  type ContactValues,
  type UncontrolledContactFormProps,
} from "./UncontrolledContactForm";
export { LoginForm, loginRules, type LoginFormProps, type LoginValues } from "./LoginForm";
export {
  LibrarySignupForm,
  librarySignupSchema,
  type LibrarySignupFormProps,
  type LibrarySignupValues,
} from "./LibrarySignupForm";
